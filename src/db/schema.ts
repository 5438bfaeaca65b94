import Database from 'better-sqlite3';

export interface UserPreferenceRow {
  user_id: string;
  activated: number; // 0 | 1
  source_language: string;
  target_language: string;
  updated_at: number;
}

export class Schema {
  private db: Database.Database;

  constructor(dbPath: string = ':memory:') {
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.createTables();
  }

  private createTables(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS user_preferences (
        user_id TEXT PRIMARY KEY,
        activated INTEGER NOT NULL CHECK(activated IN (0, 1)),
        source_language TEXT NOT NULL,
        target_language TEXT NOT NULL,
        updated_at INTEGER NOT NULL
      );
    `);
  }

  getDatabase(): Database.Database {
    return this.db;
  }

  close(): void {
    this.db.close();
  }
}
