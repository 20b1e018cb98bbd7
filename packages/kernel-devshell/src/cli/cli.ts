import process from 'node:process';
import type { Writable } from 'node:stream';
import type { Logger } from 'pino';

import { EnvironmentBootstrapper } from '../lib/bootstrapper';
import { CommandKernelInstaller } from '../lib/commandKernelInstaller';
import { BootstrapError, ConfigError, KernelInstallError, ProfileError } from '../lib/errors';
import type { KernelInstallerPort } from '../lib/kernelInstaller.port';
import { getProfile, listProfiles } from '../lib/profiles';
import { renderShellExports, renderShellHook } from '../lib/shellExports';
import { checkTools } from '../lib/toolCheck';
import type { BootstrapResult } from '../lib/types';
import { type DevshellConfig, loadDevshellConfig } from '../service/config';
import { createLogger } from '../service/logger';
import { type BootstrapCommandOptions, CliError, parseCliOptions } from './options';

export type CliIO = {
  stdout: Writable;
  stderr: Writable;
};

export type CliDeps = {
  env: NodeJS.ProcessEnv;
  cwd: string;
  createLogger: (config: DevshellConfig) => Logger;
  createInstaller: (config: DevshellConfig) => KernelInstallerPort;
  // .env file read into env before main ran
  envFile?: string;
};

const defaultIO: CliIO = {
  stdout: process.stdout,
  stderr: process.stderr,
};

export const defaultDeps = (): CliDeps => ({
  env: process.env,
  cwd: process.cwd(),
  createLogger: (config) => createLogger(config.logLevel),
  createInstaller: (config) => new CommandKernelInstaller(config.installCommand),
});

const describeError = (error: unknown): string => {
  if (
    error instanceof CliError ||
    error instanceof ConfigError ||
    error instanceof ProfileError ||
    error instanceof BootstrapError
  )
    return error.message;
  return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
};

// Installer output is captured rather than discarded; surface it with the failure
const installDiagnostics = (error: unknown): string | undefined => {
  let installError: KernelInstallError | undefined;
  if (error instanceof KernelInstallError) installError = error;
  else if (error instanceof Error && error.cause instanceof KernelInstallError) installError = error.cause;
  if (!installError) return undefined;
  const lines = [installError.message];
  const stderr = installError.details?.stderr?.trim();
  const stdout = installError.details?.stdout?.trim();
  if (stderr) lines.push(`installer stderr:\n${stderr}`);
  if (stdout) lines.push(`installer stdout:\n${stdout}`);
  return lines.join('\n');
};

const writeError = (io: CliIO, error: unknown): void => {
  io.stderr.write(`ERROR: ${describeError(error)}\n`);
  const diagnostics = installDiagnostics(error);
  if (diagnostics) io.stderr.write(`${diagnostics}\n`);
};

const resolveConfig = (deps: CliDeps, overrides: { profile?: string; kernelName?: string }): DevshellConfig => {
  const env = { ...deps.env };
  if (overrides.profile !== undefined) {
    getProfile(overrides.profile);
    env.KERNEL_DEVSHELL_PROFILE = overrides.profile;
  }
  if (overrides.kernelName !== undefined) env.KERNEL_DEVSHELL_KERNEL = overrides.kernelName;
  return loadDevshellConfig(env);
};

const formatResult = (result: BootstrapResult, format: BootstrapCommandOptions['format']): string => {
  if (format === 'shell') return renderShellExports(result.exports);
  const { install, ...rest } = result;
  const summary = install ? { ...rest, install: { exitCode: install.exitCode, signal: install.signal } } : rest;
  return `${JSON.stringify(summary, null, 2)}\n`;
};

const runBootstrap = async (options: BootstrapCommandOptions, io: CliIO, deps: CliDeps): Promise<number> => {
  const config = resolveConfig(deps, options);
  const logger = deps.createLogger(config);
  if (deps.envFile) logger.debug({ envFile: deps.envFile }, 'loaded environment file');
  const bootstrapper = new EnvironmentBootstrapper({
    installer: deps.createInstaller(config),
    logger,
    kernelName: config.kernelName,
    env: deps.env,
    searchPathVariable: config.searchPathVariable,
    mode: options.mode ?? config.mode,
    staging: options.staging ?? config.staging,
    enabled: config.shellHook,
  });
  const result = await bootstrapper.bootstrap(options.sessionRoot);
  io.stdout.write(formatResult(result, options.format));
  return 0;
};

const runProfiles = (io: CliIO): number => {
  for (const profile of listProfiles()) {
    io.stdout.write(`${profile.name}${profile.shellHook ? ' (shell hook)' : ''}: ${profile.description}\n`);
    for (const pkg of profile.packages) io.stdout.write(`  - ${pkg}\n`);
  }
  return 0;
};

const runCheck = async (profileName: string | undefined, io: CliIO, deps: CliDeps): Promise<number> => {
  const config = resolveConfig(deps, { profile: profileName });
  const profile = getProfile(config.profile);
  const statuses = await checkTools(profile.tools, deps.env);
  for (const status of statuses) {
    io.stdout.write(status.available ? `ok       ${status.name} (${status.path})\n` : `missing  ${status.name}\n`);
  }
  const missing = statuses.filter((status) => !status.available);
  if (missing.length > 0) {
    io.stderr.write(`ERROR: profile "${profile.name}" is missing ${missing.length} tool(s)\n`);
    return 1;
  }
  return 0;
};

export const main = async (
  argv: readonly string[] = process.argv.slice(2),
  io: CliIO = defaultIO,
  deps: CliDeps = defaultDeps(),
): Promise<number> => {
  try {
    const options = parseCliOptions(argv, deps.cwd);
    if (options.command === 'bootstrap') return await runBootstrap(options, io, deps);
    if (options.command === 'profiles') return runProfiles(io);
    if (options.command === 'check') return await runCheck(options.profile, io, deps);
    const profile = getProfile(options.profile ?? resolveConfig(deps, {}).profile);
    io.stdout.write(renderShellHook({ profile: profile.name, executable: options.executable }));
    return 0;
  } catch (error) {
    writeError(io, error);
    return 1;
  }
};
