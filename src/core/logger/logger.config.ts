import pino from 'pino';

export type Logger = pino.Logger;

export const logger = (): Logger => {
  const logLevel = process.env.LOG_LEVEL || 'info';

  return pino({
    level: logLevel,
    timestamp: pino.stdTimeFunctions.isoTime,
    // provider credentials ride on outgoing request headers
    redact: ['headers.Authorization', 'headers.authorization'],
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
  });
};
