/**
 * Database Unit Tests
 *
 * DatabaseAdapter initialization, migrations, transactions, and the
 * singleton lifecycle managed by getDatabase/closeDatabase.
 *
 * All tests use in-memory SQLite (`:memory:`) with WAL mode disabled
 * to avoid filesystem side effects.
 */

import {
  DatabaseAdapter,
  getDatabase,
  closeDatabase,
} from "../../storage/Database.js";

beforeAll(() => {
  jest.spyOn(console, "log").mockImplementation(() => {});
});

afterAll(() => {
  jest.restoreAllMocks();
});

function memoryAdapter(): DatabaseAdapter {
  return new DatabaseAdapter({ path: ":memory:", walMode: false });
}

describe("DatabaseAdapter", () => {
  let adapter: DatabaseAdapter;

  afterEach(() => {
    adapter?.close();
  });

  describe("initialize()", () => {
    it("should not open the database in the constructor", () => {
      adapter = memoryAdapter();

      expect(adapter.isInitialized()).toBe(false);
    });

    it("should create the schema tables", () => {
      adapter = memoryAdapter();
      adapter.initialize();

      const tableNames = adapter
        .getDb()
        .prepare<[], { name: string }>(
          "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
        )
        .all()
        .map((row) => row.name);

      expect(tableNames).toEqual(["conversation_turns", "migrations"]);
    });

    it("should record every migration once", () => {
      adapter = memoryAdapter();
      adapter.initialize();
      adapter.initialize();

      expect(adapter.appliedMigrations()).toEqual([
        "001_create_conversation_turns",
      ]);
    });

    it("should enable foreign keys", () => {
      adapter = memoryAdapter();
      adapter.initialize();

      expect(adapter.getDb().pragma("foreign_keys", { simple: true })).toBe(1);
    });
  });

  describe("getDb()", () => {
    it("should throw when database is not initialized", () => {
      adapter = memoryAdapter();

      expect(() => adapter.getDb()).toThrow(
        "Database not initialized. Call initialize() first.",
      );
    });
  });

  describe("close()", () => {
    it("should reset the initialized flag", () => {
      adapter = memoryAdapter();
      adapter.initialize();

      adapter.close();

      expect(adapter.isInitialized()).toBe(false);
      expect(() => adapter.getDb()).toThrow();
    });

    it("should be safe to call repeatedly or before initialize()", () => {
      adapter = memoryAdapter();

      expect(() => adapter.close()).not.toThrow();
      adapter.initialize();
      adapter.close();
      expect(() => adapter.close()).not.toThrow();
    });
  });

  describe("transaction()", () => {
    const insertTurn = (db: ReturnType<DatabaseAdapter["getDb"]>, role: string) =>
      db
        .prepare<[string, string, string, number]>(
          "INSERT INTO conversation_turns (connection_id, role, content, timestamp_ms) VALUES (?, ?, ?, ?)",
        )
        .run("c1", role, "hello", 1000);

    const countTurns = (db: ReturnType<DatabaseAdapter["getDb"]>) =>
      db
        .prepare<[], { count: number }>(
          "SELECT COUNT(*) AS count FROM conversation_turns",
        )
        .get()?.count;

    it("should return the value of the callback", () => {
      adapter = memoryAdapter();
      adapter.initialize();

      expect(adapter.transaction(() => 42)).toBe(42);
    });

    it("should commit every statement together", () => {
      adapter = memoryAdapter();
      adapter.initialize();
      const db = adapter.getDb();

      adapter.transaction(() => {
        insertTurn(db, "user");
        insertTurn(db, "assistant");
      });

      expect(countTurns(db)).toBe(2);
    });

    it("should roll back when a statement fails", () => {
      adapter = memoryAdapter();
      adapter.initialize();
      const db = adapter.getDb();

      expect(() =>
        adapter.transaction(() => {
          insertTurn(db, "user");
          // Rejected by the role CHECK constraint
          insertTurn(db, "system");
        }),
      ).toThrow();

      expect(countTurns(db)).toBe(0);
    });
  });
});

describe("Singleton lifecycle", () => {
  afterEach(() => {
    closeDatabase();
  });

  it("should create and initialize a single shared instance", () => {
    const db1 = getDatabase({ path: ":memory:", walMode: false });
    const db2 = getDatabase();

    expect(db1).toBeInstanceOf(DatabaseAdapter);
    expect(db1.isInitialized()).toBe(true);
    expect(db2).toBe(db1);
  });

  it("should close the instance and create a new one afterwards", () => {
    const db1 = getDatabase({ path: ":memory:", walMode: false });

    closeDatabase();
    const db2 = getDatabase({ path: ":memory:", walMode: false });

    expect(db1.isInitialized()).toBe(false);
    expect(db2).not.toBe(db1);
  });

  it("should be safe to close when no instance exists", () => {
    expect(() => closeDatabase()).not.toThrow();
  });
});
