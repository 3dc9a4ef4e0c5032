import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';

export const DEFAULT_DATABASE_PATH = './data/products.db';
const IN_MEMORY = ':memory:';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS products (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL,
    description TEXT NOT NULL DEFAULT '',
    price REAL NOT NULL,
    image_path TEXT NOT NULL DEFAULT '',
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );
`;

@Injectable()
export class DatabaseService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private db: Database.Database | null = null;

  constructor(private readonly config: ConfigService) {}

  get connection(): Database.Database {
    if (!this.db) {
      throw new Error('Database is not open');
    }
    return this.db;
  }

  onModuleInit() {
    const dbPath = this.config.get<string>('DATABASE_PATH') || DEFAULT_DATABASE_PATH;
    if (dbPath !== IN_MEMORY) {
      mkdirSync(dirname(dbPath), { recursive: true });
    }

    const db = new Database(dbPath);
    if (dbPath !== IN_MEMORY) {
      db.pragma('journal_mode = WAL');
    }
    db.exec(SCHEMA);
    this.db = db;
    this.logger.log(`SQLite database ready at ${dbPath}`);
  }

  onModuleDestroy() {
    this.db?.close();
    this.db = null;
  }
}
