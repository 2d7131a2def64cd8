export * from './base.js';
export * from './torrentio.js';
export * from './cinemeta.js';
