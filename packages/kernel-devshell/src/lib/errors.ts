export type BootstrapErrorCode =
  | 'kernels_dir_exists'
  | 'kernels_dir_not_empty'
  | 'kernels_dir_create_failed'
  | 'installer_unavailable'
  | 'installer_failed'
  | 'registration_missing'
  | 'destination_exists'
  | 'relocation_failed';

export class BootstrapError extends Error {
  code: BootstrapErrorCode;
  details?: unknown;
  constructor(message: string, code: BootstrapErrorCode, details?: unknown, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BootstrapError';
    this.code = code;
    this.details = details;
  }
}

export class DirectoryCreationError extends BootstrapError {
  constructor(message: string, code: BootstrapErrorCode, details?: unknown, options?: { cause?: unknown }) {
    super(message, code, details, options);
    this.name = 'DirectoryCreationError';
  }
}

export type InstallDiagnostics = {
  command: string;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
};

export class KernelInstallError extends BootstrapError {
  declare details?: Partial<InstallDiagnostics>;
  constructor(
    message: string,
    code: BootstrapErrorCode,
    details?: Partial<InstallDiagnostics>,
    options?: { cause?: unknown },
  ) {
    super(message, code, details, options);
    this.name = 'KernelInstallError';
  }
}

export class RelocationError extends BootstrapError {
  constructor(message: string, code: BootstrapErrorCode, details?: unknown, options?: { cause?: unknown }) {
    super(message, code, details, options);
    this.name = 'RelocationError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class ProfileError extends Error {
  profile: string;
  constructor(profile: string, known: readonly string[]) {
    super(`Unknown profile "${profile}" (expected one of: ${known.join(', ')})`);
    this.name = 'ProfileError';
    this.profile = profile;
  }
}

export const errnoCode = (error: unknown): string | undefined => {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') return error.code;
  return undefined;
};
