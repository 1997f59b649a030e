import pino, { type Logger, type LoggerOptions } from 'pino';

export function createLogger(level: string): Logger {
  const options: LoggerOptions = {
    level,
    base: undefined,
    redact: {
      paths: ['password', '*.password', 'token', '*.token', 'authorization', '*.authorization'],
      censor: '[REDACTED]'
    }
  };

  // stdout carries MCP stdio frames; logs go to stderr.
  if (process.env.MCP_LOG_PRETTY === 'true') {
    return pino(
      options,
      pino.transport({
        target: 'pino-pretty',
        options: {
          colorize: false,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: 2
        }
      })
    );
  }

  return pino(options, pino.destination({ fd: 2, sync: false }));
}
