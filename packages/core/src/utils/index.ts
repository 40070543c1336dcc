export * from './amounts.js';
export * from './sleep.js';
