export * from './lockin.js';
export * from './instrument.js';
export * from './api.js';
