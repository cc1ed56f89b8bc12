/**
 * @fileoverview Provider exports
 */

export * from './base.js';
export * from './openai.js';
