import pino, { type DestinationStream, type Logger } from 'pino';

import type { LogLevel } from './config';

// stdout carries the shell exports, so logs go to stderr
export function createLogger(level: LogLevel, destination: DestinationStream = pino.destination(2)): Logger {
  return pino({ name: 'kernel-devshell', level, base: null }, destination);
}
