export { AuthenticityClient, type AuthenticityClientOptions } from './client.js';
export * from './batch.js';
export * from './config.js';
export * from './errors.js';
export { HttpClient, apiPaths, type QueryParams, type Transport } from './http.js';
export { createLogger, LOGGER_NAME, type Logger } from './logger.js';
export * from './normalize.js';
export * from './pages.js';
export * from './poller.js';
export * from './schema.js';
export * from './types.js';
export * from './upload.js';
export * from './validation.js';
