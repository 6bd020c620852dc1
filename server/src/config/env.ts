import dotenv from "dotenv";
import path from "node:path";

export const ROOT_DIR = path.resolve(__dirname, "../../../");

dotenv.config({ path: path.join(ROOT_DIR, ".env") });

export const env = {
  port: Number(process.env.SERVER_PORT) || 4000,
  clientOrigin: process.env.CLIENT_ORIGIN || "http://localhost:3000",
  nodeEnv: process.env.NODE_ENV ?? "development"
};

export function resolveFromRoot(filePath: string): string {
  return path.isAbsolute(filePath) ? filePath : path.resolve(ROOT_DIR, filePath);
}
