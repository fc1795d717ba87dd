import winston from 'winston';
import chalk from 'chalk';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { LogLevel } from '../types';

const LEVEL_ICONS: Record<LogLevel, string> = {
  [LogLevel.ERROR]: '✗',
  [LogLevel.WARN]: '!',
  [LogLevel.INFO]: '•',
  [LogLevel.DEBUG]: '·',
};

function isLogLevel(value: unknown): value is LogLevel {
  return Object.values(LogLevel).some((level) => level === value);
}

const customFormat = winston.format.printf(({ level, message, timestamp, project, icon }) => {
  const ts = chalk.gray(`[${timestamp}]`);
  const projectTag = typeof project === 'string' ? chalk.cyan(`[${project}]`) : '';
  const iconTag = isLogLevel(icon) ? `${LEVEL_ICONS[icon]} ` : '';
  return `${ts} ${level} ${iconTag}${projectTag} ${message}`;
});

const logger = winston.createLogger({
  level: process.env.PSTACK_LOG_LEVEL ?? LogLevel.INFO,
  format: winston.format.combine(
    winston.format.timestamp({ format: 'HH:mm:ss' }),
    winston.format.colorize(),
    customFormat,
  ),
  transports: [
    new winston.transports.Console(),
  ],
});

export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}

export function addFileTransport(baseDir: string): void {
  const logDir = path.join(baseDir, '.pstack', 'logs');
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }

  logger.add(
    new winston.transports.File({
      filename: path.join(logDir, 'pstack-error.log'),
      level: LogLevel.ERROR,
      maxsize: 5 * 1024 * 1024,
      maxFiles: 3,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.json(),
      ),
    }),
  );
  logger.add(
    new winston.transports.File({
      filename: path.join(logDir, 'pstack-combined.log'),
      maxsize: 10 * 1024 * 1024,
      maxFiles: 5,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.json(),
      ),
    }),
  );
}

export function frameLog(
  project: string | null,
  message: string,
  level: LogLevel = LogLevel.DEBUG,
): void {
  logger.log({ level, message, project: project ?? '(anonymous)', icon: level });
}

export function stackLog(message: string, level: LogLevel = LogLevel.DEBUG): void {
  logger.log({ level, message, icon: level });
}

export default logger;
