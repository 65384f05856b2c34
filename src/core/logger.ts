import { Logger } from 'tslog';
import { config } from './config';

const LEVELS: Record<string, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

export const logger = new Logger({
  name: 'shipment-qna',
  minLevel: LEVELS[config.logging.level] ?? LEVELS.info,
  prettyLogTemplate: '{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} ',
  type: config.server.env === 'production' ? 'json' : 'pretty',
});
