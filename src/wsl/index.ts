/**
 * WSL Module
 *
 * Exports the command executor, device observer and VHD operations.
 */

export * from './types.js';
export * from './executor.js';
export * from './commands.js';
export * from './observer.js';
export * from './client.js';
export * from './verbose.js';
