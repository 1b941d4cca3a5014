export * from './alphabet.js';
export * from './errors.js';
export * from './notifier.js';
export * from './store.js';
export * from './controls.js';
