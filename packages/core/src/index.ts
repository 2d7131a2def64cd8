export * from './utils/index.js';
export * from './schemas.js';
export * from './main.js';
export * from './parser/index.js';
export * from './debrid/index.js';
export * from './sources/index.js';
export * from './streams/index.js';
export * from './coalescer/index.js';
export * from './ledger/index.js';
