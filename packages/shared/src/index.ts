export * from './env.js';
export * from './offers.js';
