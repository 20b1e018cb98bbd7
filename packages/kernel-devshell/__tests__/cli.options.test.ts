import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { CliError, parseCliOptions } from '../src/cli/options';

const cwd = process.cwd();

describe('parseCliOptions', () => {
  it('defaults to bootstrapping the working directory', () => {
    const options = parseCliOptions([], cwd);

    expect(options).toEqual({
      command: 'bootstrap',
      sessionRoot: cwd,
      profile: undefined,
      kernelName: undefined,
      mode: undefined,
      staging: undefined,
      format: 'shell',
    });
  });

  it('honors bootstrap overrides and negated flags', () => {
    const options = parseCliOptions(
      [
        'bootstrap',
        '--session-root',
        'notebooks',
        '--profile',
        'full',
        '--kernel',
        'rust',
        '--strict',
        '--no-staging',
        '--format',
        'json',
      ],
      cwd,
    );

    expect(options).toEqual({
      command: 'bootstrap',
      sessionRoot: path.resolve(cwd, 'notebooks'),
      profile: 'full',
      kernelName: 'rust',
      mode: 'strict',
      staging: false,
      format: 'json',
    });
  });

  it('parses the auxiliary commands', () => {
    expect(parseCliOptions(['profiles'], cwd)).toEqual({ command: 'profiles' });
    expect(parseCliOptions(['check', '--profile', 'minimal'], cwd)).toEqual({ command: 'check', profile: 'minimal' });
    expect(parseCliOptions(['hook', '--executable', 'npx kernel-devshell'], cwd)).toEqual({
      command: 'hook',
      profile: undefined,
      executable: 'npx kernel-devshell',
    });
  });

  it('rejects unknown commands, flags and stray arguments', () => {
    expect(() => parseCliOptions(['install'], cwd)).toThrow('Unknown command: install');
    expect(() => parseCliOptions(['bootstrap', '--verbose'], cwd)).toThrow(CliError);
    expect(() => parseCliOptions(['profiles', 'extra'], cwd)).toThrow('Unexpected arguments: extra');
    expect(() => parseCliOptions(['profiles', '--strict'], cwd)).toThrow('--strict is not supported by "profiles"');
  });

  it('rejects conflicting or malformed bootstrap flags', () => {
    expect(() => parseCliOptions(['--staging', '--no-staging'], cwd)).toThrow(
      'Cannot use --staging and --no-staging together',
    );
    expect(() => parseCliOptions(['--format', 'yaml'], cwd)).toThrow('--format must be "shell" or "json", got "yaml"');
    expect(() => parseCliOptions(['--kernel', 'a/b'], cwd)).toThrow('--kernel cannot contain path separators');
    expect(() => parseCliOptions(['--session-root', '  '], cwd)).toThrow('--session-root cannot be empty');
  });

  it('rejects kernel names that resolve to the kernels directory or its parent', () => {
    const message = '--kernel cannot contain path separators or be "." or ".."';
    expect(() => parseCliOptions(['--kernel', '.'], cwd)).toThrow(message);
    expect(() => parseCliOptions(['--kernel', '..'], cwd)).toThrow(message);
    expect(parseCliOptions(['--kernel', 'rust..beta'], cwd)).toMatchObject({ command: 'bootstrap', kernelName: 'rust..beta' });
  });
});
