export type { Logger, LoggerFactory } from './logger.js';
export { fromPino, getDefaultLogger } from './logger.js';
export type { ReportingSource } from './report.js';
export { reportError } from './report.js';
