import pino from 'pino';
import pretty from 'pino-pretty';

export const getLogger = () => {
  const environment = process.env.NODE_ENV ?? 'development';
  const isProduction = environment === 'production';

  const loggerConfig: pino.LoggerOptions = {
    level: process.env.LOG_LEVEL ?? 'info',
    base: {
      service: 'appimage-desktop',
      environment,
    },
  };

  if (!isProduction) {
    // stdout carries reports and desktop file contents, so logs go to stderr
    const prettyStream = pretty({
      colorize: true,
      singleLine: true,
      translateTime: 'HH:MM:ss',
      ignore: 'pid,hostname,service,environment',
      destination: process.stderr,
    });

    return pino(loggerConfig, prettyStream);
  }

  return pino(loggerConfig, pino.destination(2));
};

export type Logger = ReturnType<typeof getLogger>;
