import process from 'node:process';

import { loadDotenv } from '../service/env';
import { defaultDeps, main } from './cli';

const envFile = loadDotenv(process.cwd());
process.exitCode = await main(process.argv.slice(2), undefined, { ...defaultDeps(), envFile });
