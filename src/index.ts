export * from './supervisor';
export * from './runtime';
export * from './config/StationConfig';
export { ConfigurableLoggerFactory } from './logging/ConfigurableLoggerFactory';
export { logContext } from './logging/LogContext';
export type { LogContext } from './logging/LogContext';
