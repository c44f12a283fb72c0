// Structured logging + security counters
export type { LogContext, LogLevel, SecurityCounterSnapshot, SecurityEvent } from './types.js';

export type { Logger } from './logger.js';
export { createLogger } from './logger.js';

export type { SecurityCounters } from './security-counters.js';
export { createSecurityCounters } from './security-counters.js';
