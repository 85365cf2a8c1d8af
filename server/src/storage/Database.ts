/**
 * Database.ts - SQLite adapter for conversation persistence
 *
 * Uses better-sqlite3 for synchronous SQLite access. Schema changes are
 * applied once each and recorded in the `migrations` table.
 */

import Database from "better-sqlite3";
import { resolve } from "path";
import { existsSync, mkdirSync } from "fs";

export interface DatabaseConfig {
  /** Path to SQLite database file, or ":memory:" */
  path: string;
  walMode?: boolean;
  verbose?: boolean;
}

interface Migration {
  name: string;
  sql: string;
}

const MIGRATIONS: readonly Migration[] = [
  {
    name: "001_create_conversation_turns",
    sql: `
      CREATE TABLE conversation_turns (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        connection_id TEXT NOT NULL,
        user_id TEXT,
        role TEXT NOT NULL CHECK(role IN ('user', 'assistant')),
        content TEXT NOT NULL,
        intent TEXT,
        confidence REAL NOT NULL DEFAULT 1.0,
        timestamp_ms INTEGER NOT NULL,
        created_at TEXT NOT NULL DEFAULT (datetime('now'))
      );
      CREATE INDEX idx_turns_connection_id ON conversation_turns(connection_id);
      CREATE INDEX idx_turns_user_id ON conversation_turns(user_id);
      CREATE INDEX idx_turns_timestamp ON conversation_turns(timestamp_ms);
    `,
  },
];

export class DatabaseAdapter {
  private db: Database.Database | null = null;
  private config: Required<DatabaseConfig>;
  private initialized = false;

  constructor(config: DatabaseConfig) {
    this.config = {
      walMode: true,
      verbose: false,
      ...config,
    };
  }

  /**
   * Open the connection and run pending migrations
   */
  initialize(): void {
    if (this.initialized) {
      return;
    }

    if (this.config.path !== ":memory:") {
      const dbDir = resolve(this.config.path, "..");
      if (!existsSync(dbDir)) {
        mkdirSync(dbDir, { recursive: true });
      }
    }

    this.db = new Database(this.config.path, {
      verbose: this.config.verbose ? console.log : undefined,
    });

    if (this.config.walMode) {
      this.db.pragma("journal_mode = WAL");
    }
    this.db.pragma("foreign_keys = ON");

    this.runMigrations(this.db);

    this.initialized = true;
    console.log(`[Database] Initialized at ${this.config.path}`);
  }

  private runMigrations(db: Database.Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS migrations (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL UNIQUE,
        applied_at TEXT NOT NULL DEFAULT (datetime('now'))
      )
    `);

    const applied = new Set(
      db
        .prepare<[], { name: string }>("SELECT name FROM migrations")
        .all()
        .map((row) => row.name),
    );
    const record = db.prepare<[string]>(
      "INSERT INTO migrations (name) VALUES (?)",
    );

    for (const migration of MIGRATIONS) {
      if (applied.has(migration.name)) continue;

      db.transaction(() => {
        db.exec(migration.sql);
        record.run(migration.name);
      })();
      console.log(`[Database] Applied migration: ${migration.name}`);
    }
  }

  appliedMigrations(): string[] {
    return this.getDb()
      .prepare<[], { name: string }>("SELECT name FROM migrations ORDER BY id")
      .all()
      .map((row) => row.name);
  }

  getDb(): Database.Database {
    if (!this.db) {
      throw new Error("Database not initialized. Call initialize() first.");
    }
    return this.db;
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
      this.initialized = false;
      console.log("[Database] Connection closed");
    }
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  /**
   * Run in a transaction
   */
  transaction<T>(fn: () => T): T {
    return this.getDb().transaction(fn)();
  }
}

const defaultDbPath = resolve(process.cwd(), "data", "assistant.db");

let instance: DatabaseAdapter | null = null;

export function getDatabase(config?: Partial<DatabaseConfig>): DatabaseAdapter {
  if (!instance) {
    instance = new DatabaseAdapter({
      path: config?.path || process.env.DATABASE_PATH || defaultDbPath,
      walMode: config?.walMode ?? true,
      verbose: config?.verbose ?? false,
    });
    instance.initialize();
  }
  return instance;
}

export function closeDatabase(): void {
  if (instance) {
    instance.close();
    instance = null;
  }
}
