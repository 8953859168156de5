export * from './run-tool.js';
