/**
 * @buildmeta/server - Build metadata sync engine
 *
 * - project resolution (path → stream/project → id)
 * - one global write sequence shared by badges and user events
 * - a read/write gate giving readers consistent cross-table snapshots
 * - per-change aggregation for delta polling
 */
export * from '@buildmeta/core';

export * from './aggregate';
export * from './badges';
export * from './dialect';
export * from './engine';
export * from './errors';
export * from './gate';
export * from './migrate';
export * from './projects';
export * from './schema';
export * from './sequence';
export * from './user-events';
