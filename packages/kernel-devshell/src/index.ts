export * from './lib/types';
export * from './lib/errors';
export * from './lib/profiles';
export * from './lib/kernelRegistry';
export * from './lib/processRunner';
export * from './lib/toolCheck';
export * from './lib/shellExports';
export type { KernelInstallerPort } from './lib/kernelInstaller.port';
export { CommandKernelInstaller } from './lib/commandKernelInstaller';
export { EnvironmentBootstrapper, type EnvironmentBootstrapperOptions } from './lib/bootstrapper';
export { loadDevshellConfig, LOG_LEVELS, type DevshellConfig, type LogLevel } from './service/config';
export { createLogger } from './service/logger';
export { main, type CliIO, type CliDeps } from './cli/cli';
export { CliError, parseCliOptions, type CliOptions } from './cli/options';
