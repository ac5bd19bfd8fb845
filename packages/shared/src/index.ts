// Types
export * from './types/errors.js';
export * from './types/profile.js';
export * from './types/channel.js';

// Configuration
export * from './config/index.js';

// Utilities
export * from './utils/logger.js';
export * from './utils/ring-buffer.js';
export * from './utils/bounded-cache.js';
export * from './utils/keyed-lock.js';
export * from './utils/structured-output.js';
export * from './utils/throttler.js';
