export * from './inquiry.types.js';
export * from './quote.types.js';
export * from './activity.types.js';
