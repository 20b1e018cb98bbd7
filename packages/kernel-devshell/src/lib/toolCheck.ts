import { constants, promises as fs } from 'node:fs';
import path from 'node:path';

export type ToolStatus = {
  name: string;
  available: boolean;
  path?: string;
};

async function isExecutable(candidate: string): Promise<boolean> {
  try {
    const stat = await fs.stat(candidate);
    if (!stat.isFile()) return false;
    await fs.access(candidate, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

export async function resolveExecutable(name: string, env: NodeJS.ProcessEnv): Promise<string | undefined> {
  if (name.includes(path.sep)) return (await isExecutable(name)) ? path.resolve(name) : undefined;
  const dirs = (env.PATH ?? '').split(path.delimiter).filter((dir) => dir.length > 0);
  for (const dir of dirs) {
    const candidate = path.join(dir, name);
    if (await isExecutable(candidate)) return candidate;
  }
  return undefined;
}

export async function checkTools(names: readonly string[], env: NodeJS.ProcessEnv): Promise<ToolStatus[]> {
  const statuses: ToolStatus[] = [];
  for (const name of names) {
    const resolved = await resolveExecutable(name, env);
    statuses.push(resolved ? { name, available: true, path: resolved } : { name, available: false });
  }
  return statuses;
}
