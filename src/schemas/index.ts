export * from './connection-config.schema.js';
export * from './cdp-frame.schema.js';
export * from './recipe-metadata.schema.js';
