export type * from './generation.js';
export type * from './registry.js';
export * from './rpc.js';
export type * from './transport.js';
