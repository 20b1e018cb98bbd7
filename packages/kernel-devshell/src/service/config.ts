import { z } from 'zod';

import { ConfigError } from '../lib/errors';
import { PROFILE_NAMES, getProfile } from '../lib/profiles';
import { BOOTSTRAP_MODES, DEFAULT_SEARCH_PATH_VARIABLE, isSafeKernelName } from '../lib/types';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const booleanFlag = (defaultValue: boolean) =>
  z
    .union([z.boolean(), z.string()])
    .default(defaultValue ? 'true' : 'false')
    .transform((value) => {
      if (typeof value === 'boolean') return value;
      const normalized = value.trim().toLowerCase();
      if (!normalized) return defaultValue;
      if (['1', 'true', 'yes', 'y', 'on'].includes(normalized)) return true;
      if (['0', 'false', 'no', 'n', 'off'].includes(normalized)) return false;
      return defaultValue;
    });

const optionalTrimmed = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const devshellConfigSchema = z.object({
  home: z.string({ required_error: 'HOME is required' }).trim().min(1, 'HOME is required'),
  profile: z.enum(PROFILE_NAMES).default('full'),
  kernelName: optionalTrimmed.refine((value) => value === undefined || isSafeKernelName(value), {
    message: 'kernel name cannot contain path separators or be "." or ".."',
  }),
  installCommand: optionalTrimmed.transform((value) => (value ? value.split(/\s+/) : undefined)),
  mode: z.enum(BOOTSTRAP_MODES).default('guarded'),
  staging: booleanFlag(true),
  searchPathVariable: z
    .string()
    .trim()
    .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'search path variable must be a valid environment variable name')
    .default(DEFAULT_SEARCH_PATH_VARIABLE),
  logLevel: z.enum(LOG_LEVELS).default('warn'),
});

type ParsedConfig = z.infer<typeof devshellConfigSchema>;

export type DevshellConfig = Omit<ParsedConfig, 'kernelName' | 'installCommand'> & {
  kernelName: string;
  installCommand: string[];
  shellHook: boolean;
};

const emptyToUndefined = (value: string | undefined): string | undefined => (value === '' ? undefined : value);

export function loadDevshellConfig(env: NodeJS.ProcessEnv = process.env): DevshellConfig {
  const parsed = devshellConfigSchema.safeParse({
    home: env.HOME,
    profile: emptyToUndefined(env.KERNEL_DEVSHELL_PROFILE),
    kernelName: env.KERNEL_DEVSHELL_KERNEL,
    installCommand: env.KERNEL_DEVSHELL_INSTALL_COMMAND,
    mode: emptyToUndefined(env.KERNEL_DEVSHELL_MODE),
    staging: env.KERNEL_DEVSHELL_STAGING,
    searchPathVariable: emptyToUndefined(env.KERNEL_DEVSHELL_SEARCH_PATH_VAR),
    logLevel: emptyToUndefined(env.KERNEL_DEVSHELL_LOG_LEVEL),
  });
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid kernel-devshell configuration: ${issues.join('; ')}`);
  }

  const profile = getProfile(parsed.data.profile);
  return {
    ...parsed.data,
    kernelName: parsed.data.kernelName ?? profile.kernelName,
    installCommand: parsed.data.installCommand ?? [...profile.installCommand],
    shellHook: profile.shellHook,
  };
}
