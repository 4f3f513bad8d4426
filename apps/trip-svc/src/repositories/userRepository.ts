import { v4 as uuidv4 } from 'uuid';
import { BadRequestError, CreateUserRequest, User } from '@tripplanner/shared';

/**
 * Credential store. Usernames and emails are unique; `findByLogin` accepts either.
 */
export interface UserRepository {
  readonly kind: 'mysql' | 'sqlite' | 'memory';
  create(request: CreateUserRequest): Promise<User>;
  findById(id: string): Promise<User | null>;
  findByUsername(username: string): Promise<User | null>;
  findByEmail(email: string): Promise<User | null>;
  findByLogin(login: string): Promise<User | null>;
  touchLastLogin(id: string): Promise<void>;
  delete(id: string): Promise<boolean>;
  ping(): Promise<boolean>;
  close(): Promise<void>;
}

export class MemoryUserRepository implements UserRepository {
  readonly kind = 'memory';
  private users = new Map<string, User>();

  constructor(private readonly clock: () => Date = () => new Date()) {}

  async create(request: CreateUserRequest): Promise<User> {
    if (await this.findByUsername(request.username)) {
      throw new BadRequestError('Username already registered');
    }
    if (await this.findByEmail(request.email)) {
      throw new BadRequestError('Email already registered');
    }
    const user: User = {
      id: uuidv4(),
      username: request.username,
      email: request.email,
      passwordHash: request.passwordHash,
      fullName: request.fullName,
      isActive: true,
      createdAt: this.clock().toISOString()
    };
    this.users.set(user.id, user);
    return { ...user };
  }

  async findById(id: string): Promise<User | null> {
    const user = this.users.get(id);
    return user ? { ...user } : null;
  }

  async findByUsername(username: string): Promise<User | null> {
    return this.find((user) => user.username === username);
  }

  async findByEmail(email: string): Promise<User | null> {
    const wanted = email.toLowerCase();
    return this.find((user) => user.email.toLowerCase() === wanted);
  }

  async findByLogin(login: string): Promise<User | null> {
    return (await this.findByUsername(login)) ?? (await this.findByEmail(login));
  }

  async touchLastLogin(id: string): Promise<void> {
    const user = this.users.get(id);
    if (user) {
      user.lastLoginAt = this.clock().toISOString();
    }
  }

  async delete(id: string): Promise<boolean> {
    return this.users.delete(id);
  }

  /** Flips the active flag; accounts are otherwise never deactivated through the API. */
  async setActive(id: string, isActive: boolean): Promise<void> {
    const user = this.users.get(id);
    if (user) {
      user.isActive = isActive;
    }
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    this.users.clear();
  }

  private find(predicate: (user: User) => boolean): User | null {
    for (const user of this.users.values()) {
      if (predicate(user)) {
        return { ...user };
      }
    }
    return null;
  }
}
