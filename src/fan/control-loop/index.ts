/**
 * Fan Control Loop Component
 */

export * from './control-loop.js';
