/**
 * Domain model exports.
 */

export * from './error-presentation';
export * from './errors';
