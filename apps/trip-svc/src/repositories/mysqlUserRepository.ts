import mysql, { Pool, ResultSetHeader, RowDataPacket } from 'mysql2/promise';
import { v4 as uuidv4 } from 'uuid';
import { BadRequestError, CreateUserRequest, UnavailableError, User } from '@tripplanner/shared';
import { UserRepository } from './userRepository';

interface UserRow extends RowDataPacket {
  id: string;
  username: string;
  email: string;
  password_hash: string;
  full_name: string | null;
  is_active: number;
  created_at: Date;
  last_login: Date | null;
}

const CONNECTION_ERRORS = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'ENOTFOUND',
  'PROTOCOL_CONNECTION_LOST',
  'ER_ACCESS_DENIED_ERROR',
  'ER_BAD_DB_ERROR'
]);

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Rewrites driver failures into the service error taxonomy: connectivity
 * problems become 503s, anything else is rethrown untouched.
 */
function translate(error: unknown): never {
  const code = errorCode(error);
  if (code !== undefined && CONNECTION_ERRORS.has(code)) {
    console.error('❌ MySQL unavailable:', code);
    throw new UnavailableError();
  }
  throw error;
}

function toUser(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    passwordHash: row.password_hash,
    fullName: row.full_name ?? undefined,
    isActive: row.is_active === 1,
    createdAt: new Date(row.created_at).toISOString(),
    lastLoginAt: row.last_login ? new Date(row.last_login).toISOString() : undefined
  };
}

export class MySqlUserRepository implements UserRepository {
  readonly kind = 'mysql';

  constructor(private readonly db: Pool) {}

  static connect(uri: string): MySqlUserRepository {
    const pool = mysql.createPool({
      uri,
      connectionLimit: 10,
      queueLimit: 0,
      timezone: 'Z'
    });
    console.log('✅ MySQL pool created');
    return new MySqlUserRepository(pool);
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
      await this.db.execute<ResultSetHeader>(
        `INSERT INTO users (id, username, email, password_hash, full_name, is_active, created_at)
         VALUES (?, ?, ?, ?, ?, 1, ?)`,
        [id, request.username, request.email, request.passwordHash, request.fullName ?? null, new Date()]
      );
    } catch (error) {
      if (errorCode(error) === 'ER_DUP_ENTRY') {
        throw new BadRequestError('Username or email already registered');
      }
      translate(error);
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
    return this.findOne('SELECT * FROM users WHERE username = ? OR email = ? LIMIT 1', [login, login]);
  }

  async touchLastLogin(id: string): Promise<void> {
    try {
      await this.db.execute<ResultSetHeader>('UPDATE users SET last_login = ? WHERE id = ?', [new Date(), id]);
    } catch (error) {
      translate(error);
    }
  }

  async delete(id: string): Promise<boolean> {
    try {
      const [result] = await this.db.execute<ResultSetHeader>('DELETE FROM users WHERE id = ?', [id]);
      return result.affectedRows > 0;
    } catch (error) {
      translate(error);
    }
  }

  async ping(): Promise<boolean> {
    try {
      await this.db.query('SELECT 1');
      return true;
    } catch (error) {
      console.error('MySQL ping failed:', error);
      return false;
    }
  }

  async close(): Promise<void> {
    await this.db.end();
  }

  private async findOne(sql: string, params: string[]): Promise<User | null> {
    try {
      const [rows] = await this.db.execute<UserRow[]>(sql, params);
      return rows.length > 0 ? toUser(rows[0]) : null;
    } catch (error) {
      translate(error);
    }
  }
}
