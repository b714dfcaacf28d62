export * from './types/snapshot.js';
export * from './types/action.js';
export * from './types/errors.js';
export * from './constants.js';
export * from './errors.js';
export * from './action-id.js';
export * from './schemas.js';
export * from './snapshot-formatter.js';
export * from './action-space-formatter.js';
