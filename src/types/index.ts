export * from './ids.js';
export * from './models.js';
