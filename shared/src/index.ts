export * from './forum-types.js';
export * from './api-types.js';
