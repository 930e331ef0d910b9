import { promises as fs } from "fs";
import path from "path";

export interface JobWorkspace {
  rootDir: string;
  path(name: string): string;
  dispose(): Promise<void>;
}

export function safeJoin(baseDir: string, name: string): string {
  const joined = path.join(baseDir, name);
  const rel = path.relative(baseDir, joined);
  if (!rel || rel.startsWith("..") || path.isAbsolute(rel)) {
    throw new Error(`unsafe workspace path: ${name}`);
  }
  return joined;
}

/** Scratch directory owned by one job's worker; removed when the job reaches a terminal state. */
export async function createJobWorkspace(rootDir: string, batchId: string, sampleId: string): Promise<JobWorkspace> {
  const batchDir = safeJoin(path.resolve(rootDir), batchId);
  const root = safeJoin(batchDir, sampleId);
  await fs.mkdir(root, { recursive: true });

  return {
    rootDir: root,
    path: (name: string) => safeJoin(root, name),
    dispose: async () => {
      await fs.rm(root, { recursive: true, force: true });
    }
  };
}
