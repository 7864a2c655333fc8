export * from './types/index.js';
export { EventBus, createEvent } from './event-bus/index.js';
export type { WildcardChannel } from './event-bus/index.js';
export { Logger, getLogger, withLogLevel, setLogSink, isLogLevel } from './logger/index.js';
export type { LogLevel, LogSink } from './logger/index.js';
export { RegistrationLedger } from './ledger/index.js';
export type { NewRegistration } from './ledger/index.js';
