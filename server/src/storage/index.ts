/**
 * Storage module exports
 */

export { DatabaseAdapter, getDatabase, closeDatabase } from "./Database.js";
export type { DatabaseConfig } from "./Database.js";

export { ConversationStore } from "./ConversationStore.js";
export type {
  ConversationRepository,
  ConversationTurn,
  ConversationTurnInput,
  TurnRole,
} from "./ConversationStore.js";
