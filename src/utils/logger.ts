import winston from 'winston';
import { REBALANCE_CONFIG } from '../config/constants';

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.simple()
    ),
  }),
];

const logger = winston.createLogger({
  level: REBALANCE_CONFIG.LOG_LEVEL,
  silent: REBALANCE_CONFIG.SILENT_LOGS,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.json()
  ),
  transports,
});

export default logger;
