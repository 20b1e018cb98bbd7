import fs from 'node:fs';
import path from 'node:path';

import { parse } from 'dotenv';

const isProduction = (env: NodeJS.ProcessEnv) => env.NODE_ENV?.toLowerCase() === 'production';

// Reads <sessionRoot>/.env into env without overriding variables that are
// already set. Returns the file that was loaded.
export function loadDotenv(sessionRoot: string = process.cwd(), env: NodeJS.ProcessEnv = process.env): string | undefined {
  if (isProduction(env)) return undefined;

  const candidate = path.resolve(sessionRoot, '.env');
  if (!fs.existsSync(candidate)) return undefined;

  const parsed = parse(fs.readFileSync(candidate));
  for (const [key, value] of Object.entries(parsed)) {
    if (env[key] === undefined) env[key] = value;
  }
  return candidate;
}
