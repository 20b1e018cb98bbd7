import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ProfileError } from '../src/lib/errors';
import { getProfile, listProfiles } from '../src/lib/profiles';
import { checkTools, resolveExecutable } from '../src/lib/toolCheck';

describe('profiles', () => {
  it('keeps the two environment variants distinct', () => {
    const full = getProfile('full');
    const minimal = getProfile('minimal');

    expect(full.shellHook).toBe(true);
    expect(full.packages).toContain('python312Packages.ipympl');
    expect(full.tools).toContain('jupyter');
    expect(minimal.shellHook).toBe(false);
    expect(minimal.packages).toEqual(['rust-bin.stable.latest.default', 'evcxr']);
    expect(minimal.installCommand).toEqual(['evcxr_jupyter', '--install']);
    expect(listProfiles().map((profile) => profile.name)).toEqual(['full', 'minimal']);
  });

  it('rejects unknown profile names', () => {
    expect(() => getProfile('gpu')).toThrow(ProfileError);
    expect(() => getProfile('toString')).toThrow(ProfileError);
  });
});

describe('checkTools', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'devshell-tools-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('resolves executables in PATH order and ignores directories', async () => {
    const first = path.join(tempDir, 'first');
    const second = path.join(tempDir, 'second');
    await fs.mkdir(path.join(first, 'jupyter'), { recursive: true });
    await fs.mkdir(second);
    await fs.writeFile(path.join(second, 'jupyter'), '#!/bin/sh\n', { mode: 0o755 });
    await fs.writeFile(path.join(first, 'rustc'), '#!/bin/sh\n', { mode: 0o755 });
    const env = { PATH: [first, second].join(path.delimiter) };

    expect(await resolveExecutable('jupyter', env)).toBe(path.join(second, 'jupyter'));
    expect(await checkTools(['rustc', 'jupyter', 'cargo'], env)).toEqual([
      { name: 'rustc', available: true, path: path.join(first, 'rustc') },
      { name: 'jupyter', available: true, path: path.join(second, 'jupyter') },
      { name: 'cargo', available: false },
    ]);
  });

  it('treats an empty PATH as having no tools', async () => {
    expect(await checkTools(['cargo'], {})).toEqual([{ name: 'cargo', available: false }]);
  });
});
