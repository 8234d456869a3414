/**
 * Sync Module
 *
 * Authority/replica replication of one entity shape: transform, health,
 * death flag. Snapshots flow authority -> replicas; commands flow the other way.
 */

export * from './role';
export * from './snapshot-stream';
export * from './snapshot';
export * from './snapshot-channel';
export * from './reconcile';
export * from './authority-guard';
export * from './command';
export * from './mutation';
export * from './death-edge';
export * from './state';
export * from './motion';
export * from './config';
export * from './capabilities';
