export * from './audit.js';
export * from './claimTree.js';
export * from './combined.js';
export * from './config.js';
export * from './did.js';
export * from './errors.js';
export * from './json.js';
export * from './jws.js';
export * from './keys.js';
export * from './random.js';
export * from './sdjwt.js';
