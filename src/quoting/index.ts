export * from './quote.engine.js';
export * from './discount.js';
