// Re-export all protocol types

export * from './common.js';
export * from './ownership.js';
export * from './pages.js';
export * from './requests.js';
export * from './treasury.js';
export * from './reactions.js';
export * from './events.js';
