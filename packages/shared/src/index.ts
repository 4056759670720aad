// Types
export type * from './types/aircraft.js';
export type * from './types/results.js';
export type * from './types/protocol.js';

// Configuration types and defaults
export * from './types/config.js';

// Utilities
export * from './utils/units.js';
