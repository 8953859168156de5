/**
 * Host hardware tooling
 */

export * from './dependencies.js';
