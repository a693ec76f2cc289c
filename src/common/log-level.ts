import { LogLevel as NestLogLevel } from '@nestjs/common';
import { LogLevel } from '../config/app-config';

const NEST_LEVELS: Record<LogLevel, NestLogLevel[]> = {
  error: ['fatal', 'error'],
  warn: ['fatal', 'error', 'warn'],
  info: ['fatal', 'error', 'warn', 'log'],
  debug: ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'],
};

/** Nest logger levels enabled by a verbosity name. */
export const toNestLogLevels = (level: LogLevel): NestLogLevel[] => NEST_LEVELS[level];
