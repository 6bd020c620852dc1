import { ItemError, Project } from "../models/_types";

export function groupByProject<T extends { projectId: string }>(entries: readonly T[]): Map<string, T[]> {
  const grouped = new Map<string, T[]>();
  for (const entry of entries) {
    const bucket = grouped.get(entry.projectId);
    if (bucket) {
      bucket.push(entry);
    } else {
      grouped.set(entry.projectId, [entry]);
    }
  }
  return grouped;
}

/**
 * Runs `compute` for each project. A project that throws becomes an error
 * marker in its slot; the others are still computed.
 */
export function mapProjects<T>(
  projects: readonly Project[],
  component: string,
  compute: (project: Project) => T
): Array<T | ItemError> {
  return projects.map((project): T | ItemError => {
    try {
      return compute(project);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[${component}] project ${project.id} failed:`, message);
      return {
        status: "error",
        projectId: project.id,
        projectName: project.name,
        message
      };
    }
  });
}
