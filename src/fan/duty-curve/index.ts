/**
 * Duty Curve Component
 */

export * from './duty-curve.js';
