export * from './coverage.js';
export * from './trend.js';
export * from './rankings.js';
export * from './publishers.js';
export * from './topics.js';
export * from './lag.js';
