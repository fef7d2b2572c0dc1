export * from './fields.js';
export * from './filters.js';
export * from './stats.js';
export * from './distribution.js';
export * from './activity.js';
