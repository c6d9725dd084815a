export * from './settings.js';
export * from './enums.js';
export type * from './remote.js';
