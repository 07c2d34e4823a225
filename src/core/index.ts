/**
 * Core - Entity IDs, phase scheduling and debug assertions
 */

export * from './constants';
export * from './entity-id';
export * from './system';
export * from './debug';
