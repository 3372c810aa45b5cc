// Re-export all schema tables
export * from './pages.js';
export * from './requests.js';
export * from './treasuries.js';
export * from './reactions.js';
