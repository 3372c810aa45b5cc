export { recordParticipant, listParticipants } from './ledger.js';
