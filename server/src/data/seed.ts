import { seedDatabase } from "./seedDatabase";

seedDatabase(process.argv[2]).catch((error) => {
  console.error("Failed to seed database:", error);
  process.exit(1);
});
