// src/utils/logger.ts

import pino from 'pino';

// stdout carries the MCP protocol; logs go to stderr
export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  base: { service: 'swarmflow' }
}, pino.destination(2));

export type Logger = typeof logger;

export function createComponentLogger(component: string): Logger {
  return logger.child({ component });
}
