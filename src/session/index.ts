/**
 * Conversation transcript
 */

export { Transcript, pendingToolUses } from './transcript.js';
