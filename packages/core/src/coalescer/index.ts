export * from './singleFlight.js';
export * from './debouncer.js';
