export * from './email.parser.js';
export * from './email-cleaner.js';
export * from './sender.extractor.js';
export * from './product.extractor.js';
export * from './signal.extractor.js';
export * from './gap.analyzer.js';
