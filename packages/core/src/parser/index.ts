export * from './files.js';
export * from './title.js';
export * from './query.js';
