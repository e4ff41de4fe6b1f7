import pino from 'pino';

export const logger = (component?: string) => {
  const logLevel = process.env.LOG_LEVEL || 'info';

  return pino({
    level: logLevel,
    base: component ? { component } : undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: ['adminSecretKey', 'admin_secret_key', 'email'],
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
  });
};
