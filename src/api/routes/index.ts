export * from './health.route.js';
export * from './inquiries.route.js';
export * from './quotes.route.js';
export * from './activity.route.js';
