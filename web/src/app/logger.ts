// web/src/app/logger.ts
const PREFIX = '[streakboard]';

export const logger = {
  info: (message: string, ...rest: unknown[]) => console.info(PREFIX, message, ...rest),
  warn: (message: string, ...rest: unknown[]) => console.warn(PREFIX, message, ...rest),
  error: (message: string, ...rest: unknown[]) => console.error(PREFIX, message, ...rest),
};
