import { KernelInstallError, errnoCode } from './errors';
import type { KernelInstallerPort } from './kernelInstaller.port';
import { globalKernelsDir } from './kernelRegistry';
import { runProcess } from './processRunner';
import type { InstallRequest, InstallResult } from './types';

/**
 * Installs a kernel by running an external tool that registers it in the
 * per-user Jupyter data directory (evcxr_jupyter --install by default).
 *
 * When the request carries a dataHome, the tool runs with XDG_DATA_HOME
 * pointing there, so the registration lands in <dataHome>/jupyter/kernels.
 */
export class CommandKernelInstaller implements KernelInstallerPort {
  private readonly command: string;
  private readonly args: readonly string[];

  constructor(commandLine: readonly string[]) {
    const [command, ...args] = commandLine;
    if (!command) throw new Error('installer command cannot be empty');
    this.command = command;
    this.args = args;
  }

  get description(): string {
    return [this.command, ...this.args].join(' ');
  }

  async install(request: InstallRequest): Promise<InstallResult> {
    const env: NodeJS.ProcessEnv = { ...request.env };
    if (request.dataHome !== undefined) env.XDG_DATA_HOME = request.dataHome;

    let sourceDir: string;
    try {
      sourceDir = globalKernelsDir(env);
    } catch (error) {
      throw new KernelInstallError(
        `kernel installer "${this.description}" has no registry to write to: ${error instanceof Error ? error.message : String(error)}`,
        'installer_unavailable',
        { command: this.description },
        { cause: error },
      );
    }
    try {
      const result = await runProcess(this.command, this.args, { env });
      return { ...result, sourceDir };
    } catch (error) {
      throw new KernelInstallError(
        `failed to launch kernel installer "${this.description}" (${errnoCode(error) ?? 'unknown error'})`,
        'installer_unavailable',
        { command: this.description },
        { cause: error },
      );
    }
  }
}
