/**
 * Fan Controller Configuration
 */

export * from './configuration.js';
