export { Logger, logger, setLogLevel, getLogLevel } from './logger.js';
