/**
 * @fileoverview Core building blocks shared across sourcewise modules.
 */

export * from './errors.js';
export * from './result.js';
