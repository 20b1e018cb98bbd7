import { promises as fs } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

import { errnoCode } from './errors';
import { KERNELS_DIR, KERNEL_SPEC_FILE, LOCAL_JUPYTER_DIR } from './types';

// Subset of the Jupyter kernelspec format that notebook front-ends rely on
export const kernelSpecSchema = z
  .object({
    argv: z.array(z.string()).min(1),
    display_name: z.string().min(1),
    language: z.string().min(1),
    interrupt_mode: z.enum(['signal', 'message']).optional(),
    env: z.record(z.string(), z.string()).optional(),
    metadata: z.record(z.string(), z.unknown()).optional(),
  })
  .passthrough();

export type KernelSpec = z.infer<typeof kernelSpecSchema>;

export type KernelSpecReadResult = { ok: true; spec: KernelSpec } | { ok: false; reason: string };

export const localSearchPath = (sessionRoot: string): string => path.join(sessionRoot, LOCAL_JUPYTER_DIR);

export const localKernelsDir = (sessionRoot: string): string => path.join(localSearchPath(sessionRoot), KERNELS_DIR);

/**
 * Per-user data directory Jupyter tools write kernels under:
 * $XDG_DATA_HOME/jupyter, falling back to ~/.local/share/jupyter.
 */
export function userDataDir(env: NodeJS.ProcessEnv): string {
  const dataHome = env.XDG_DATA_HOME?.trim();
  if (dataHome && path.isAbsolute(dataHome)) return path.join(dataHome, 'jupyter');
  const home = env.HOME?.trim();
  if (!home) throw new Error('HOME is not set; cannot locate the user kernel registry');
  return path.join(home, '.local', 'share', 'jupyter');
}

export const globalKernelsDir = (env: NodeJS.ProcessEnv): string => path.join(userDataDir(env), KERNELS_DIR);

export async function pathExists(p: string): Promise<boolean> {
  try {
    await fs.stat(p);
    return true;
  } catch {
    return false;
  }
}

export async function isDirectory(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isDirectory();
  } catch {
    return false;
  }
}

export async function isEmptyDir(dir: string): Promise<boolean> {
  const entries = await fs.readdir(dir);
  return entries.length === 0;
}

export async function hasKernelSpec(kernelDir: string): Promise<boolean> {
  return pathExists(path.join(kernelDir, KERNEL_SPEC_FILE));
}

export async function readKernelSpec(kernelDir: string): Promise<KernelSpecReadResult> {
  let raw: string;
  try {
    raw = await fs.readFile(path.join(kernelDir, KERNEL_SPEC_FILE), 'utf8');
  } catch (error) {
    return { ok: false, reason: `${KERNEL_SPEC_FILE} unreadable (${errnoCode(error) ?? 'unknown'})` };
  }
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return { ok: false, reason: `${KERNEL_SPEC_FILE} is not valid JSON` };
  }
  const parsed = kernelSpecSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    return { ok: false, reason: `invalid ${KERNEL_SPEC_FILE}: ${issues.join('; ')}` };
  }
  return { ok: true, spec: parsed.data };
}

/**
 * Moves a directory tree. Falls back to copy + remove when source and
 * destination live on different devices.
 */
export async function moveDirectory(source: string, destination: string): Promise<void> {
  try {
    await fs.rename(source, destination);
  } catch (error) {
    if (errnoCode(error) !== 'EXDEV') throw error;
    await fs.cp(source, destination, { recursive: true, errorOnExist: true, force: false });
    await fs.rm(source, { recursive: true, force: true });
  }
}
