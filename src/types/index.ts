export type * from './connection.js';
export type * from './cdp.js';
export type * from './recipe.js';
export type * from './execution.js';
