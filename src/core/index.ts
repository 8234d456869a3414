/**
 * Core - tick scheduling, deferred tasks, entity ids and the world
 */

export * from './constants';
export * from './entity-id';
export * from './system';
export * from './tasks';
export * from './world';
