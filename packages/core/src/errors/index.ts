/**
 * Error types and utilities for hop transfers.
 *
 * @packageDocumentation
 */

export * from './errors.js';
export * from './predicates.js';
export * from './messages.js';
