/**
 * @vk-enum/shared - Enum model, symbol factories and value resolution.
 */

export * from './types.js';
export * from './factory.js';
export * from './resolver.js';
export * from './lookup.js';
