/**
 * Mode State Machine Component
 */

export * from './mode-state-machine.js';
