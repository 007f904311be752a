/**
 * Prompt templates module
 */
export * from './types.js';
export * from './ReplyTemplate.js';
export * from './TitleTemplate.js';
