/**
 * System Module
 *
 * Core infrastructure of the relay: scheduling, dispatching, publishing,
 * error handling, logging and configuration.
 */

export * from './types';
export * from './clock';
export * from './logger';
export * from './error-handling';
export * from './config';
export * from './scheduler';
export * from './dispatcher';
export * from './notification';
export * from './system';
