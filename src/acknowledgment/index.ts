export * from './acknowledgment.generator.js';
