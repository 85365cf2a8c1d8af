/**
 * ConversationStore.ts - Persist voice command exchanges
 *
 * Each voice command produces a user turn and an assistant turn, written
 * together. Recent turns for a user feed the brain adapter as memory.
 */

import type Database from "better-sqlite3";
import { DatabaseAdapter } from "./Database.js";

export type TurnRole = "user" | "assistant";

export interface ConversationTurnInput {
  connectionId: string;
  userId: string | null;
  role: TurnRole;
  content: string;
  intent?: string;
  confidence?: number;
  timestampMs: number;
}

export interface ConversationTurn {
  id: number;
  connectionId: string;
  userId: string | null;
  role: TurnRole;
  content: string;
  intent: string | null;
  confidence: number;
  timestampMs: number;
}

/**
 * What the dispatch handlers and brain adapter need from persistence
 */
export interface ConversationRepository {
  saveExchange(turns: ConversationTurnInput[]): void;
  getRecentTurns(userId: string, limit: number): ConversationTurn[];
}

interface TurnRow {
  id: number;
  connectionId: string;
  userId: string | null;
  role: string;
  content: string;
  intent: string | null;
  confidence: number;
  timestampMs: number;
}

interface TurnParams {
  connectionId: string;
  userId: string | null;
  role: TurnRole;
  content: string;
  intent: string | null;
  confidence: number;
  timestampMs: number;
}

const SELECT_COLUMNS = `
  id, connection_id as connectionId, user_id as userId, role, content,
  intent, confidence, timestamp_ms as timestampMs
`;

export class ConversationStore implements ConversationRepository {
  private insertStmt: Database.Statement<[TurnParams]>;
  private byConnectionStmt: Database.Statement<[string], TurnRow>;
  private recentByUserStmt: Database.Statement<[string, number], TurnRow>;
  private countStmt: Database.Statement<[], { count: number }>;

  constructor(private readonly db: DatabaseAdapter) {
    const conn = db.getDb();

    this.insertStmt = conn.prepare<TurnParams>(`
      INSERT INTO conversation_turns
        (connection_id, user_id, role, content, intent, confidence, timestamp_ms)
      VALUES
        (@connectionId, @userId, @role, @content, @intent, @confidence, @timestampMs)
    `);

    this.byConnectionStmt = conn.prepare<[string], TurnRow>(`
      SELECT ${SELECT_COLUMNS}
      FROM conversation_turns
      WHERE connection_id = ?
      ORDER BY timestamp_ms ASC, id ASC
    `);

    this.recentByUserStmt = conn.prepare<[string, number], TurnRow>(`
      SELECT ${SELECT_COLUMNS}
      FROM conversation_turns
      WHERE user_id = ?
      ORDER BY timestamp_ms DESC, id DESC
      LIMIT ?
    `);

    this.countStmt = conn.prepare<[], { count: number }>(
      "SELECT COUNT(*) as count FROM conversation_turns",
    );
  }

  /**
   * Write all turns or none
   */
  saveExchange(turns: ConversationTurnInput[]): void {
    this.db.transaction(() => {
      for (const turn of turns) {
        this.insertStmt.run({
          connectionId: turn.connectionId,
          userId: turn.userId,
          role: turn.role,
          content: turn.content,
          intent: turn.intent ?? null,
          confidence: turn.confidence ?? 1.0,
          timestampMs: turn.timestampMs,
        });
      }
    });
  }

  /**
   * Most recent turns for a user, oldest first
   */
  getRecentTurns(userId: string, limit: number): ConversationTurn[] {
    return this.recentByUserStmt.all(userId, limit).map(toTurn).reverse();
  }

  getByConnection(connectionId: string): ConversationTurn[] {
    return this.byConnectionStmt.all(connectionId).map(toTurn);
  }

  count(): number {
    return this.countStmt.get()?.count ?? 0;
  }
}

function toTurn(row: TurnRow): ConversationTurn {
  return {
    ...row,
    role: row.role === "assistant" ? "assistant" : "user",
  };
}
