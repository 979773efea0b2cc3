// @roomsense/protocol
// Types, defaults and configuration validation shared by every package

export * from './types/index.js';
export * from './defaults.js';
export * from './validation/area-config.js';
