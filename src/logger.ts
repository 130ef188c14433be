import winston from 'winston';

export interface LoggerOptions {
  level?: string;
  logFilePath?: string;
  silent?: boolean;
}

export function createLogger(options: LoggerOptions = {}): winston.Logger {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: winston.format.simple(),
      level: 'error'
    })
  ];

  if (options.logFilePath) {
    transports.push(new winston.transports.File({ filename: options.logFilePath }));
  }

  return winston.createLogger({
    level: options.level ?? 'info',
    silent: options.silent ?? false,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.json()
    ),
    transports
  });
}
