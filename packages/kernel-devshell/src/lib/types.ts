export const BOOTSTRAP_MODES = ['guarded', 'strict'] as const;
export type BootstrapMode = (typeof BOOTSTRAP_MODES)[number];

export const DEFAULT_KERNEL_NAME = 'rust';
export const DEFAULT_SEARCH_PATH_VARIABLE = 'JUPYTER_PATH';

export const LOCAL_JUPYTER_DIR = '.jupyter';
export const KERNELS_DIR = 'kernels';
export const KERNEL_SPEC_FILE = 'kernel.json';

// Kernel names become a single directory under the kernels dir
export const isSafeKernelName = (name: string): boolean => name !== '.' && name !== '..' && !/[\\/]/.test(name);

export type InstallRequest = {
  kernelName: string;
  // Overrides XDG_DATA_HOME for the installer; undefined keeps the user's data dir
  dataHome?: string;
  env: NodeJS.ProcessEnv;
};

export type InstallResult = {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  // Directory the installer is expected to have written <kernelName>/ into
  sourceDir: string;
};

export type BootstrapStatus = 'bootstrapped' | 'skipped' | 'disabled';

export type BootstrapResult = {
  status: BootstrapStatus;
  sessionRoot: string;
  kernelName: string;
  kernelsDir: string;
  kernelDir: string;
  searchPath: string;
  exports: Record<string, string>;
  install?: InstallResult;
};
