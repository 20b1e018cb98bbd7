import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { loadDotenv } from '../src/service/env';

describe('loadDotenv', () => {
  let sessionRoot: string;

  beforeEach(async () => {
    sessionRoot = await fs.mkdtemp(path.join(os.tmpdir(), 'devshell-env-'));
  });

  afterEach(async () => {
    await fs.rm(sessionRoot, { recursive: true, force: true });
  });

  it('reads the session .env without overriding variables already set', async () => {
    await fs.writeFile(
      path.join(sessionRoot, '.env'),
      'KERNEL_DEVSHELL_PROFILE=minimal\nKERNEL_DEVSHELL_LOG_LEVEL=debug\nHOME=/elsewhere\n',
      'utf8',
    );
    const env: NodeJS.ProcessEnv = { HOME: '/home/dev', KERNEL_DEVSHELL_LOG_LEVEL: 'info' };

    const loaded = loadDotenv(sessionRoot, env);

    expect(loaded).toBe(path.join(sessionRoot, '.env'));
    expect(env).toEqual({ HOME: '/home/dev', KERNEL_DEVSHELL_LOG_LEVEL: 'info', KERNEL_DEVSHELL_PROFILE: 'minimal' });
  });

  it('returns undefined when the session has no .env', () => {
    const env: NodeJS.ProcessEnv = { HOME: '/home/dev' };

    expect(loadDotenv(sessionRoot, env)).toBeUndefined();
    expect(env).toEqual({ HOME: '/home/dev' });
  });

  it('skips the file in production', async () => {
    await fs.writeFile(path.join(sessionRoot, '.env'), 'KERNEL_DEVSHELL_PROFILE=minimal\n', 'utf8');
    const env: NodeJS.ProcessEnv = { NODE_ENV: 'Production' };

    expect(loadDotenv(sessionRoot, env)).toBeUndefined();
    expect(env).toEqual({ NODE_ENV: 'Production' });
  });
});
