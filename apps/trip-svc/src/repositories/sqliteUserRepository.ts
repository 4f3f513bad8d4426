import Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';
import { BadRequestError, CreateUserRequest, User } from '@tripplanner/shared';
import { UserRepository } from './userRepository';

interface UserRow {
  id: string;
  username: string;
  email: string;
  password_hash: string;
  full_name: string | null;
  is_active: number;
  created_at: string;
  last_login: string | null;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS users (
    id TEXT NOT NULL PRIMARY KEY,
    username TEXT NOT NULL UNIQUE,
    email TEXT NOT NULL UNIQUE COLLATE NOCASE,
    password_hash TEXT NOT NULL,
    full_name TEXT NULL,
    is_active INTEGER NOT NULL DEFAULT 1,
    created_at TEXT NOT NULL,
    last_login TEXT NULL
  )
`;

function toUser(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    passwordHash: row.password_hash,
    fullName: row.full_name ?? undefined,
    isActive: row.is_active === 1,
    createdAt: row.created_at,
    lastLoginAt: row.last_login ?? undefined
  };
}

function isUniqueViolation(error: unknown): boolean {
  return error instanceof Database.SqliteError && error.code === 'SQLITE_CONSTRAINT_UNIQUE';
}

/**
 * Credential store in a local SQLite file, used when no MySQL database is
 * configured. Creates its table on open.
 */
export class SqliteUserRepository implements UserRepository {
  readonly kind = 'sqlite';

  constructor(
    private readonly db: Database.Database,
    private readonly clock: () => Date = () => new Date()
  ) {
    this.db.exec(SCHEMA);
  }

  static open(filename: string): SqliteUserRepository {
    const db = new Database(filename);
    db.pragma('journal_mode = WAL');
    console.log(`✅ SQLite credential store at ${filename}`);
    return new SqliteUserRepository(db);
  }

  async create(request: CreateUserRequest): Promise<User> {
    if (await this.findByUsername(request.username)) {
      throw new BadRequestError('Username already registered');
    }
    if (await this.findByEmail(request.email)) {
      throw new BadRequestError('Email already registered');
    }

    const id = uuidv4();
    try {
      this.db
        .prepare(
          `INSERT INTO users (id, username, email, password_hash, full_name, is_active, created_at)
           VALUES (?, ?, ?, ?, ?, 1, ?)`
        )
        .run(id, request.username, request.email, request.passwordHash, request.fullName ?? null, this.clock().toISOString());
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new BadRequestError('Username or email already registered');
      }
      throw error;
    }

    const created = await this.findById(id);
    if (!created) {
      throw new Error(`User ${id} was not readable after insert`);
    }
    return created;
  }

  async findById(id: string): Promise<User | null> {
    return this.findOne('SELECT * FROM users WHERE id = ?', [id]);
  }

  async findByUsername(username: string): Promise<User | null> {
    return this.findOne('SELECT * FROM users WHERE username = ?', [username]);
  }

  async findByEmail(email: string): Promise<User | null> {
    return this.findOne('SELECT * FROM users WHERE email = ?', [email]);
  }

  async findByLogin(login: string): Promise<User | null> {
    return (await this.findByUsername(login)) ?? (await this.findByEmail(login));
  }

  async touchLastLogin(id: string): Promise<void> {
    this.db.prepare('UPDATE users SET last_login = ? WHERE id = ?').run(this.clock().toISOString(), id);
  }

  async delete(id: string): Promise<boolean> {
    return this.db.prepare('DELETE FROM users WHERE id = ?').run(id).changes > 0;
  }

  async setActive(id: string, isActive: boolean): Promise<void> {
    this.db.prepare('UPDATE users SET is_active = ? WHERE id = ?').run(isActive ? 1 : 0, id);
  }

  async ping(): Promise<boolean> {
    try {
      this.db.prepare('SELECT 1').get();
      return true;
    } catch (error) {
      console.error('SQLite ping failed:', error);
      return false;
    }
  }

  async close(): Promise<void> {
    if (this.db.open) {
      this.db.close();
    }
  }

  private findOne(sql: string, params: string[]): User | null {
    const row = this.db.prepare<string[], UserRow>(sql).get(...params);
    return row ? toUser(row) : null;
  }
}
