export * from './runtime-setup.js';
