export * from './severity.js';
export * from './text.js';
