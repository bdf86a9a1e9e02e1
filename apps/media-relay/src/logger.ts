import winston from 'winston';
import path from 'path';

const LOG_DIR = process.env.MEDIA_RELAY_LOG_DIR;

const transports: winston.transport[] = [
  // Console for the container/systemd journal
  new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.simple()
    )
  })
];

if (LOG_DIR) {
  transports.push(new winston.transports.File({ filename: path.join(LOG_DIR, 'media-relay.log') }));
}

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.json()
  ),
  transports
});
