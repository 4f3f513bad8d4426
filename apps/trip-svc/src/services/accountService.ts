import bcrypt from 'bcrypt';
import {
  AuthenticationError,
  BadRequestError,
  PublicUser,
  RegisterRequest,
  TokenClaims,
  TokenPair,
  User,
  validateEmail,
  validatePassword,
  validateUsername
} from '@tripplanner/shared';
import { UserRepository } from '../repositories/userRepository';
import { TokenIssuer } from './tokenIssuer';

export function toPublicUser(user: User): PublicUser {
  const { passwordHash: _passwordHash, ...rest } = user;
  return rest;
}

/**
 * Registration, login and token lifecycle on top of the credential store.
 */
export class AccountService {
  constructor(
    private readonly users: UserRepository,
    private readonly tokens: TokenIssuer,
    private readonly bcryptRounds: number
  ) {}

  async register(request: RegisterRequest): Promise<PublicUser> {
    validateEmail(request.email);
    validateUsername(request.username);
    validatePassword(request.password);

    const passwordHash = await bcrypt.hash(request.password, this.bcryptRounds);
    const user = await this.users.create({
      username: request.username,
      email: request.email,
      passwordHash,
      fullName: request.fullName
    });
    console.log(`✅ Registered user ${user.username}`);
    return toPublicUser(user);
  }

  /**
   * `login` is matched against usernames first, then emails.
   */
  async login(login: string, password: string): Promise<TokenPair> {
    if (login === '' || password === '') {
      throw new BadRequestError('Username and password are required');
    }

    const user = await this.users.findByLogin(login);
    if (!user || !(await bcrypt.compare(password, user.passwordHash))) {
      throw new AuthenticationError('Incorrect username or password');
    }
    if (!user.isActive) {
      throw new BadRequestError('Inactive user');
    }

    const pair = await this.tokens.issuePair(user);
    try {
      await this.users.touchLastLogin(user.id);
    } catch (error) {
      console.warn(`⚠️ Could not update last login for ${user.username}:`, error);
    }
    return pair;
  }

  /**
   * Trades a refresh token for a new pair. The presented token is revoked.
   */
  async refresh(refreshToken: string): Promise<TokenPair> {
    let claims: TokenClaims;
    try {
      claims = await this.tokens.verify(refreshToken, 'refresh');
    } catch (error) {
      if (error instanceof AuthenticationError) {
        throw new AuthenticationError('Invalid refresh token');
      }
      throw error;
    }
    if (!(await this.tokens.hasRefreshTokens(claims.sub))) {
      throw new AuthenticationError('Invalid refresh token');
    }

    const user = await this.users.findByUsername(claims.sub);
    if (!user || user.id !== claims.uid || !user.isActive) {
      throw new AuthenticationError('User not found or inactive');
    }

    await this.tokens.revoke(refreshToken);
    return this.tokens.issuePair(user);
  }

  /**
   * Resolves a bearer access token to its active user.
   */
  async authenticate(accessToken: string): Promise<User> {
    const claims = await this.tokens.verify(accessToken, 'access');
    const user = await this.users.findByUsername(claims.sub);
    if (!user || user.id !== claims.uid) {
      throw new AuthenticationError();
    }
    if (!user.isActive) {
      throw new BadRequestError('Inactive user');
    }
    return user;
  }

  async logout(accessToken: string, refreshToken?: string): Promise<void> {
    await this.tokens.revoke(accessToken);
    if (refreshToken) {
      await this.tokens.revoke(refreshToken);
    }
  }

  async deleteAccount(user: User, accessToken: string): Promise<void> {
    await this.tokens.revoke(accessToken);
    await this.users.delete(user.id);
    await this.tokens.forgetRefreshTokens(user.username);
    console.log(`🗑️ Deleted user ${user.username}`);
  }
}
