import { ProfileError } from './errors';
import { DEFAULT_KERNEL_NAME } from './types';

export type Profile = {
  name: string;
  description: string;
  // Attribute paths the package provider must supply
  packages: readonly string[];
  // Executables expected on PATH once the packages are provisioned
  tools: readonly string[];
  shellHook: boolean;
  kernelName: string;
  installCommand: readonly string[];
};

export const PROFILE_NAMES = ['full', 'minimal'] as const;
export type ProfileName = (typeof PROFILE_NAMES)[number];

const EVCXR_INSTALL = ['evcxr_jupyter', '--install'] as const;

export const PROFILES: Readonly<Record<ProfileName, Profile>> = {
  full: {
    name: 'full',
    description: 'Rust beta toolchain with Jupyter, ipympl and a project-local evcxr kernel',
    packages: [
      'pkg-config',
      'rust-bin.beta.latest.default',
      'python312Packages.jupyter',
      'python312Packages.ipympl',
      'evcxr',
    ],
    tools: ['cargo', 'rustc', 'jupyter', 'evcxr_jupyter', 'pkg-config'],
    shellHook: true,
    kernelName: DEFAULT_KERNEL_NAME,
    installCommand: EVCXR_INSTALL,
  },
  minimal: {
    name: 'minimal',
    description: 'Rust toolchain and evcxr only; no kernel is registered on shell entry',
    packages: ['rust-bin.stable.latest.default', 'evcxr'],
    tools: ['cargo', 'rustc', 'evcxr_jupyter'],
    shellHook: false,
    kernelName: DEFAULT_KERNEL_NAME,
    installCommand: EVCXR_INSTALL,
  },
};

export const isProfileName = (value: string): value is ProfileName =>
  (PROFILE_NAMES as readonly string[]).includes(value);

export function getProfile(name: string): Profile {
  if (!isProfileName(name)) throw new ProfileError(name, PROFILE_NAMES);
  return PROFILES[name];
}

export function listProfiles(): Profile[] {
  return PROFILE_NAMES.map((name) => PROFILES[name]);
}
