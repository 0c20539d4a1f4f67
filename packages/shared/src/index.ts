export * from './result.js';
export * from './zones.js';
export * from './compliance.js';
