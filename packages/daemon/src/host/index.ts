export * from './command-runner.js';
export * from './node-process-capability.js';
export * from './fs-persistence-artifact.js';
export * from './shell-host-power.js';
