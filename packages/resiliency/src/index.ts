export * from './liveness-reporter.js';
