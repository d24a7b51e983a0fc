export * from './types.js';
export * from './epoch-gate.js';
export * from './command-parser.js';
export * from './command-interpreter.js';
export * from './process-terminator.js';
export * from './channel-loop.js';
export * from './matrix-transport.js';
export * from './host/index.js';
export * from './agent.js';
