// Types
export type * from './types/track.js';
export type * from './types/call.js';
export type * from './types/radio.js';
export type * from './types/protocol.js';

// Utilities
export * from './utils/geo.js';
export * from './utils/units.js';
export * from './utils/geometry.js';
