export { react, nextReaction, adjustTally, type ReactInput, type ReactResult } from './reactions.js';
