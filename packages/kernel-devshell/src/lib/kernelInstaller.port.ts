import type { InstallRequest, InstallResult } from './types';

export interface KernelInstallerPort {
  readonly description: string;
  install(request: InstallRequest): Promise<InstallResult>;
}
