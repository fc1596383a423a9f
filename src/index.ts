// src/index.ts

export * from './schema';
export * from './ast';
export * from './reconcile';
export * from './core/config-loader';
export * from './core/format';
export * from './core/server';
export * from './core/playground';
export * from './core/init';
export * from './core/watcher';
export { Logger, defaultLogger, isLogLevel, type LogLevel, type LoggerOptions } from './util/logger';
