/**
 * Telemetry Component
 */

export * from './telemetry-source.js';
export * from './nvidia-smi.js';
