export * from './errors.js';
export * from './keys.js';
export * from './logger.js';
export * from './schemas.js';
