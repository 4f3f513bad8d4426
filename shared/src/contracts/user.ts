/**
 * User service contracts
 */

export interface User {
  id: string;
  username: string;
  email: string;
  passwordHash: string;
  fullName?: string;
  isActive: boolean;
  createdAt: string;
  lastLoginAt?: string;
}

export type PublicUser = Omit<User, 'passwordHash'>;

export interface CreateUserRequest {
  username: string;
  email: string;
  passwordHash: string;
  fullName?: string;
}

export interface RegisterRequest {
  email: string;
  username: string;
  password: string;
  fullName?: string;
}

export type TokenType = 'access' | 'refresh';

export interface TokenClaims {
  sub: string;
  /** Id of the account the token was issued to; a later account with the same username does not match. */
  uid: string;
  type: TokenType;
  exp: number;
  jti: string;
  iat?: number;
}

export interface TokenPair {
  accessToken: string;
  refreshToken: string;
  tokenType: 'bearer';
}

// Wire shapes (snake_case, as the form client expects them)

export interface UserPayload {
  id: string;
  username: string;
  email: string;
  full_name: string | null;
  created_at: string;
  is_active: boolean;
}

export interface TokenPayload {
  access_token: string;
  refresh_token: string;
  token_type: 'bearer';
}

export function toUserPayload(user: PublicUser): UserPayload {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    full_name: user.fullName ?? null,
    created_at: user.createdAt,
    is_active: user.isActive
  };
}

export function toTokenPayload(pair: TokenPair): TokenPayload {
  return {
    access_token: pair.accessToken,
    refresh_token: pair.refreshToken,
    token_type: pair.tokenType
  };
}
