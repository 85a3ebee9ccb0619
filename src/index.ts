export { TrackerEngine, type TrackerOptions, type TaskDraft, type TaskUpdate, type UserUpdate } from './tracker/engine.js';
export type { TaskStatistics } from './tracker/queries.js';
export * from './model.js';
export { ValidationError } from './errors.js';
export { parseDueDate, parseIdList, parsePriority, parseStatus, formatDate } from './parse.js';
export { createLogger, silentLogger, type Logger, type LogLevel } from './log.js';
export { readEnv, engineOptionsFromEnv, configReport, type EnvConfig } from './config.js';
