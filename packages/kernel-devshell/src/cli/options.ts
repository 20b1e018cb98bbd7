import { parseArgs } from 'node:util';
import path from 'node:path';

import { type BootstrapMode, isSafeKernelName } from '../lib/types';

export class CliError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliError';
  }
}

export const COMMANDS = ['bootstrap', 'profiles', 'check', 'hook'] as const;
export type Command = (typeof COMMANDS)[number];

export type OutputFormat = 'shell' | 'json';

export type BootstrapCommandOptions = {
  command: 'bootstrap';
  sessionRoot: string;
  profile?: string;
  kernelName?: string;
  mode?: BootstrapMode;
  staging?: boolean;
  format: OutputFormat;
};

export type CliOptions =
  | BootstrapCommandOptions
  | { command: 'profiles' }
  | { command: 'check'; profile?: string }
  | { command: 'hook'; profile?: string; executable?: string };

type RawOptionValues = {
  'session-root'?: string;
  profile?: string;
  kernel?: string;
  strict?: boolean;
  staging?: boolean;
  format?: string;
  executable?: string;
};

const isCommand = (value: string): value is Command => (COMMANDS as readonly string[]).includes(value);

const normalizeArgv = (argv: readonly string[]): { args: string[]; stagingNegated: boolean } => {
  let stagingNegated = false;
  const args: string[] = [];
  for (const arg of argv) {
    if (arg === '--no-staging') {
      stagingNegated = true;
      continue;
    }
    args.push(arg);
  }
  return { args, stagingNegated };
};

const nonEmpty = (value: string | undefined, flag: string): string | undefined => {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  if (!trimmed) throw new CliError(`${flag} cannot be empty`);
  return trimmed;
};

const rejectFlags = (values: RawOptionValues, command: Command, allowed: ReadonlyArray<keyof RawOptionValues>): void => {
  for (const key of Object.keys(values)) {
    if (!(allowed as readonly string[]).includes(key)) throw new CliError(`--${key} is not supported by "${command}"`);
  }
};

export const parseCliOptions = (argv: readonly string[], cwd: string): CliOptions => {
  const normalized = normalizeArgv(argv);
  let parsed: { values: RawOptionValues; positionals: string[] };
  try {
    parsed = parseArgs({
      args: normalized.args,
      options: {
        'session-root': { type: 'string' },
        profile: { type: 'string' },
        kernel: { type: 'string' },
        strict: { type: 'boolean' },
        staging: { type: 'boolean' },
        format: { type: 'string' },
        executable: { type: 'string' },
      },
      allowPositionals: true,
    });
  } catch (error) {
    throw new CliError(error instanceof Error ? error.message : String(error));
  }
  const { values, positionals } = parsed;

  const [commandArg = 'bootstrap', ...rest] = positionals;
  if (!isCommand(commandArg)) throw new CliError(`Unknown command: ${commandArg}`);
  if (rest.length > 0) throw new CliError(`Unexpected arguments: ${rest.join(' ')}`);

  const profile = nonEmpty(values.profile, '--profile');

  switch (commandArg) {
    case 'profiles':
      rejectFlags(values, commandArg, []);
      return { command: 'profiles' };
    case 'check':
      rejectFlags(values, commandArg, ['profile']);
      return { command: 'check', profile };
    case 'hook':
      rejectFlags(values, commandArg, ['profile', 'executable']);
      return { command: 'hook', profile, executable: nonEmpty(values.executable, '--executable') };
    case 'bootstrap':
      break;
  }

  rejectFlags(values, commandArg, ['session-root', 'profile', 'kernel', 'strict', 'staging', 'format']);
  if (normalized.stagingNegated && values.staging === true)
    throw new CliError('Cannot use --staging and --no-staging together');

  const format = values.format ?? 'shell';
  if (format !== 'shell' && format !== 'json') throw new CliError(`--format must be "shell" or "json", got "${format}"`);

  const kernelName = nonEmpty(values.kernel, '--kernel');
  if (kernelName !== undefined && !isSafeKernelName(kernelName))
    throw new CliError('--kernel cannot contain path separators or be "." or ".."');

  const staging = normalized.stagingNegated ? false : values.staging;
  const sessionRoot = nonEmpty(values['session-root'], '--session-root') ?? '.';

  return {
    command: 'bootstrap',
    sessionRoot: path.resolve(cwd, sessionRoot),
    profile,
    kernelName,
    mode: values.strict ? 'strict' : undefined,
    staging,
    format,
  };
};
