export * from './env.js';
export * from './errors.js';
export * from './logger.js';
export * from './time.js';
export * from './http.js';
export * from './config.js';
