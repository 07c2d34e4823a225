/**
 * Math Module
 */

export * from './vec';
