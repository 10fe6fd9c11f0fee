export * from './JobStore.js';
export * from './JobTracker.js';
export * from './dispatchers.js';
