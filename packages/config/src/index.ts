export * from './schemas.js';
export * from './agent-config.js';
