export * from './thread.js';
export * from './repair.js';
export * from './serialization.js';
export * from './store.js';
export * from './disk-store.js';
