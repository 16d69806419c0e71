export * from './decoys.js';
export * from './issuer.js';
export * from './policy.js';
