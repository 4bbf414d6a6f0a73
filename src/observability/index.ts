export { ContextLogger, MemoryOutput, silentLogger } from './context-logger.js';
export type { ContextLoggerOptions, WritableOutput } from './context-logger.js';
