export * from './enums.js';
export * from './project-runs.js';
