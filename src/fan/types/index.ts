/**
 * GPU fan controller - Type Definitions
 */

export * from './thermal-sample.js';
export * from './fan-policy.js';
export * from './control-mode.js';
