/**
 * Domain model exports.
 */

export * from './artifact';
export * from './credential';
export * from './deployment';
export * from './errors';
export * from './events';
export * from './pipeline';
export * from './redaction';
export * from './run';
export * from './source';
export * from './stage';
