/**
 * Thermal Sample Component
 */

export * from './thermal-sample.js';
