export * from './types.js';
export * from './group-map.js';
export * from './reader.js';
export * from './classify.js';
export * from './builder.js';
export * from './validator.js';
export * from './analyzer.js';
