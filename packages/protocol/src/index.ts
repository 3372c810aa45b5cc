// @quire/protocol
// Domain types, events and payload format checks shared by every package.

export * from './types/index.js';
export * from './validation/content.js';
