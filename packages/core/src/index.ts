/**
 * @switchboard/core — shared types, errors, collaborator interfaces and
 * utilities. Zero runtime dependencies.
 */

export * from './types/index.js';
export * from './errors/index.js';
export * from './utils/index.js';

export type * from './interfaces/channel.js';
export type * from './interfaces/model.js';
export type * from './interfaces/observer.js';
export type * from './interfaces/registers.js';
export type * from './interfaces/stores.js';
export type * from './interfaces/tool.js';
