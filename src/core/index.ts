/**
 * Core functionality: errors, logging and configuration
 */

export * from './errors';
export * from './logger';
export * from './config';
