/**
 * Fan Actuator Component
 */

export * from './fan-actuator.js';
export * from './ipmi-actuator.js';
