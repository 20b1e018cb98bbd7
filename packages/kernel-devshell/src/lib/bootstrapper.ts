import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { Logger } from 'pino';

import { DirectoryCreationError, KernelInstallError, RelocationError, errnoCode } from './errors';
import type { KernelInstallerPort } from './kernelInstaller.port';
import {
  hasKernelSpec,
  isDirectory,
  isEmptyDir,
  localKernelsDir,
  localSearchPath,
  moveDirectory,
  pathExists,
  readKernelSpec,
} from './kernelRegistry';
import type { BootstrapMode, BootstrapResult, InstallResult } from './types';
import { DEFAULT_KERNEL_NAME, DEFAULT_SEARCH_PATH_VARIABLE } from './types';

export type EnvironmentBootstrapperOptions = {
  installer: KernelInstallerPort;
  logger: Logger;
  kernelName?: string;
  env?: NodeJS.ProcessEnv;
  searchPathVariable?: string;
  mode?: BootstrapMode;
  // Run the installer against a throwaway data dir instead of the user's registry
  staging?: boolean;
  // Profiles without a shell hook leave the session untouched
  enabled?: boolean;
};

type SessionPaths = {
  sessionRoot: string;
  searchPath: string;
  kernelsDir: string;
  kernelDir: string;
};

/**
 * Prepares a project-local Jupyter kernel registry for a shell session:
 * creates <sessionRoot>/.jupyter/kernels, runs the kernel installer,
 * moves the registration it produced into the local directory and exports
 * the search-path variable (JUPYTER_PATH by default).
 *
 * Steps run in order and the first failure aborts the rest. Nothing is
 * rolled back, so a failed run can leave an empty kernels directory behind.
 */
export class EnvironmentBootstrapper {
  private readonly installer: KernelInstallerPort;
  private readonly logger: Logger;
  private readonly kernelName: string;
  private readonly env: NodeJS.ProcessEnv;
  private readonly searchPathVariable: string;
  private readonly mode: BootstrapMode;
  private readonly staging: boolean;
  private readonly enabled: boolean;

  constructor(options: EnvironmentBootstrapperOptions) {
    this.installer = options.installer;
    this.logger = options.logger;
    this.kernelName = options.kernelName ?? DEFAULT_KERNEL_NAME;
    this.env = options.env ?? process.env;
    this.searchPathVariable = options.searchPathVariable ?? DEFAULT_SEARCH_PATH_VARIABLE;
    this.mode = options.mode ?? 'guarded';
    this.staging = options.staging ?? true;
    this.enabled = options.enabled ?? true;
  }

  async bootstrap(sessionRoot: string): Promise<BootstrapResult> {
    const paths = this.resolvePaths(sessionRoot);
    const log = this.logger.child({ sessionRoot: paths.sessionRoot, kernelName: this.kernelName });

    if (!this.enabled) {
      log.debug('kernel bootstrap disabled for this profile');
      return this.result('disabled', paths, {});
    }

    if (this.mode === 'guarded' && (await hasKernelSpec(paths.kernelDir))) {
      log.info({ kernelDir: paths.kernelDir }, 'kernel already registered locally; skipping install');
      return this.result('skipped', paths, this.exportSearchPath(paths));
    }

    await this.createKernelsDir(paths);
    log.debug({ kernelsDir: paths.kernelsDir }, 'local kernels directory ready');

    const install = await this.installAndRelocate(paths, log);

    const exports = this.exportSearchPath(paths);
    log.info({ kernelDir: paths.kernelDir, [this.searchPathVariable]: paths.searchPath }, 'kernel bootstrapped');
    return this.result('bootstrapped', paths, exports, install);
  }

  private resolvePaths(sessionRoot: string): SessionPaths {
    const root = path.resolve(sessionRoot);
    const kernelsDir = localKernelsDir(root);
    return {
      sessionRoot: root,
      searchPath: localSearchPath(root),
      kernelsDir,
      kernelDir: path.join(kernelsDir, this.kernelName),
    };
  }

  private async createKernelsDir(paths: SessionPaths): Promise<void> {
    try {
      if (this.mode === 'strict') {
        await fs.mkdir(paths.searchPath, { recursive: true });
        await fs.mkdir(paths.kernelsDir);
        return;
      }
      await fs.mkdir(paths.kernelsDir, { recursive: true });
      if (!(await isEmptyDir(paths.kernelsDir))) {
        throw new DirectoryCreationError(
          `local kernels directory ${paths.kernelsDir} already exists and is not empty`,
          'kernels_dir_not_empty',
          { path: paths.kernelsDir },
        );
      }
    } catch (error) {
      if (error instanceof DirectoryCreationError) throw error;
      const code = errnoCode(error);
      if (code === 'EEXIST' && this.mode === 'strict' && (await isDirectory(paths.kernelsDir))) {
        throw new DirectoryCreationError(
          `local kernels directory ${paths.kernelsDir} already exists`,
          'kernels_dir_exists',
          { path: paths.kernelsDir },
          { cause: error },
        );
      }
      throw new DirectoryCreationError(
        `cannot create local kernels directory ${paths.kernelsDir} (${code ?? 'unknown error'})`,
        'kernels_dir_create_failed',
        { path: paths.kernelsDir, errno: code },
        { cause: error },
      );
    }
  }

  private async installAndRelocate(paths: SessionPaths, log: Logger): Promise<InstallResult> {
    const stagingDir = this.staging ? await fs.mkdtemp(path.join(os.tmpdir(), 'kernel-devshell-')) : undefined;
    try {
      const install = await this.install(stagingDir, log);
      await this.relocate(install, paths, log);
      return install;
    } finally {
      if (stagingDir) await fs.rm(stagingDir, { recursive: true, force: true });
    }
  }

  private async install(stagingDir: string | undefined, log: Logger): Promise<InstallResult> {
    log.debug({ installer: this.installer.description, stagingDir }, 'running kernel installer');
    const result = await this.installer.install({ kernelName: this.kernelName, dataHome: stagingDir, env: this.env });
    if (result.exitCode !== 0) {
      log.warn(
        { exitCode: result.exitCode, signal: result.signal, stderr: result.stderr.trim() },
        'kernel installer exited unsuccessfully',
      );
    }
    return result;
  }

  private async relocate(install: InstallResult, paths: SessionPaths, log: Logger): Promise<void> {
    const source = path.join(install.sourceDir, this.kernelName);
    if (!(await pathExists(source))) {
      const cause =
        install.exitCode === 0
          ? undefined
          : new KernelInstallError(
              `kernel installer "${this.installer.description}" exited with ${install.signal ?? `code ${install.exitCode}`}`,
              'installer_failed',
              {
                command: this.installer.description,
                exitCode: install.exitCode,
                signal: install.signal,
                stdout: install.stdout,
                stderr: install.stderr,
              },
            );
      throw new RelocationError(
        `kernel registration not found at ${source}`,
        'registration_missing',
        { source, destination: paths.kernelDir },
        { cause },
      );
    }
    if (await pathExists(paths.kernelDir)) {
      throw new RelocationError(`kernel destination ${paths.kernelDir} already exists`, 'destination_exists', {
        source,
        destination: paths.kernelDir,
      });
    }

    try {
      await moveDirectory(source, paths.kernelDir);
    } catch (error) {
      const code = errnoCode(error);
      throw new RelocationError(
        `cannot move kernel registration to ${paths.kernelDir} (${code ?? 'unknown error'})`,
        'relocation_failed',
        { source, destination: paths.kernelDir, errno: code },
        { cause: error },
      );
    }

    const spec = await readKernelSpec(paths.kernelDir);
    if (spec.ok) {
      log.debug({ displayName: spec.spec.display_name, language: spec.spec.language }, 'kernel spec relocated');
    } else {
      log.warn({ kernelDir: paths.kernelDir, reason: spec.reason }, 'relocated kernel has no usable kernel spec');
    }
  }

  private exportSearchPath(paths: SessionPaths): Record<string, string> {
    this.env[this.searchPathVariable] = paths.searchPath;
    return { [this.searchPathVariable]: paths.searchPath };
  }

  private result(
    status: BootstrapResult['status'],
    paths: SessionPaths,
    exports: Record<string, string>,
    install?: InstallResult,
  ): BootstrapResult {
    return {
      status,
      sessionRoot: paths.sessionRoot,
      kernelName: this.kernelName,
      kernelsDir: paths.kernelsDir,
      kernelDir: paths.kernelDir,
      searchPath: paths.searchPath,
      exports,
      ...(install ? { install } : {}),
    };
  }
}
