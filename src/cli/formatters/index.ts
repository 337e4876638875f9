export * from './types.js';
export * from './human.js';
export * from './json.js';
