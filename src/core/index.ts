/**
 * Core module exports
 */
export { logger, setLogLevel, createChildLogger, parseLogLevel, symbols, type LogLevel } from './Logger.js';
export { PrometheusRecorder, noopRecorder, type ApiCallRecorder } from './Metrics.js';
export { Application, createApplication } from './Application.js';
