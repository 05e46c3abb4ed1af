export * from './budget.js';
export * from './last-turn.js';
export * from './manager.js';
export * from './models.js';
export * from './segment.js';
export * from './token-counter.js';
