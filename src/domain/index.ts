/**
 * Domain model exports.
 */

export * from './audit';
export * from './errors';
export * from './permission';
export * from './run';
