import jwt, { JwtPayload } from 'jsonwebtoken';
import { v4 as uuidv4 } from 'uuid';
import { AuthenticationError, TokenClaims, TokenPair, TokenType, User } from '@tripplanner/shared';
import { KeyValueStore } from '../store/keyValueStore';

export interface TokenIssuerOptions {
  secret: string;
  store: KeyValueStore;
  accessTtlSeconds: number;
  refreshTtlSeconds: number;
  clock?: () => number;
}

const REFRESH_INDEX_PREFIX_LENGTH = 10;

function toClaims(decoded: string | JwtPayload | null): TokenClaims | null {
  if (decoded === null || typeof decoded === 'string') {
    return null;
  }
  const type: unknown = decoded.type;
  const jti: unknown = decoded.jti;
  const uid: unknown = decoded.uid;
  if (
    typeof decoded.sub !== 'string' ||
    decoded.sub === '' ||
    typeof decoded.exp !== 'number' ||
    typeof jti !== 'string' ||
    typeof uid !== 'string' ||
    (type !== 'access' && type !== 'refresh')
  ) {
    return null;
  }
  return { sub: decoded.sub, uid, type, exp: decoded.exp, jti, iat: decoded.iat };
}

/**
 * Mints and checks HS256 access/refresh tokens. Revocations and the refresh
 * index are kept in the key-value store and expire with the tokens they track.
 */
export class TokenIssuer {
  private secret: string;
  private store: KeyValueStore;
  private accessTtlSeconds: number;
  private refreshTtlSeconds: number;
  private clock: () => number;

  constructor(options: TokenIssuerOptions) {
    this.secret = options.secret;
    this.store = options.store;
    this.accessTtlSeconds = options.accessTtlSeconds;
    this.refreshTtlSeconds = options.refreshTtlSeconds;
    this.clock = options.clock ?? Date.now;
  }

  async issuePair(user: Pick<User, 'id' | 'username'>): Promise<TokenPair> {
    const accessToken = this.sign(user, 'access');
    const refreshToken = this.sign(user, 'refresh');
    await this.store.set(this.refreshIndexKey(user.username, refreshToken), refreshToken, this.refreshTtlSeconds);
    return { accessToken, refreshToken, tokenType: 'bearer' };
  }

  async verify(token: string, expectedType: TokenType): Promise<TokenClaims> {
    let claims: TokenClaims | null;
    try {
      claims = toClaims(jwt.verify(token, this.secret, { algorithms: ['HS256'], clockTimestamp: this.nowSeconds() }));
    } catch {
      throw new AuthenticationError();
    }
    if (!claims || claims.type !== expectedType) {
      throw new AuthenticationError();
    }
    if (await this.store.get(this.revokedKey(claims.jti))) {
      throw new AuthenticationError();
    }
    return claims;
  }

  /**
   * Blacklists a token until it would have expired anyway. Undecodable or
   * already-expired tokens need no entry.
   */
  async revoke(token: string): Promise<void> {
    const claims = toClaims(jwt.decode(token));
    if (!claims) {
      return;
    }
    const ttl = claims.exp - this.nowSeconds();
    if (ttl > 0) {
      await this.store.set(this.revokedKey(claims.jti), String(claims.exp), ttl);
    }
  }

  async isRevoked(token: string): Promise<boolean> {
    const claims = toClaims(jwt.decode(token));
    return claims !== null && (await this.store.get(this.revokedKey(claims.jti))) !== null;
  }

  /** Whether the user still has a live refresh index entry; cleared when the account is deleted. */
  async hasRefreshTokens(username: string): Promise<boolean> {
    return (await this.store.keys(`refresh:${username}:`)).length > 0;
  }

  async forgetRefreshTokens(username: string): Promise<void> {
    const keys = await this.store.keys(`refresh:${username}:`);
    await Promise.all(keys.map((key) => this.store.delete(key)));
  }

  private sign(user: Pick<User, 'id' | 'username'>, type: TokenType): string {
    const iat = this.nowSeconds();
    const ttl = type === 'access' ? this.accessTtlSeconds : this.refreshTtlSeconds;
    return jwt.sign({ sub: user.username, uid: user.id, type, jti: uuidv4(), iat, exp: iat + ttl }, this.secret, {
      algorithm: 'HS256'
    });
  }

  // Keyed on the token's leading characters, which every HS256 JWT shares,
  // so each user keeps one entry: the newest refresh token.
  private refreshIndexKey(username: string, token: string): string {
    return `refresh:${username}:${token.slice(0, REFRESH_INDEX_PREFIX_LENGTH)}`;
  }

  private revokedKey(jti: string): string {
    return `revoked:${jti}`;
  }

  private nowSeconds(): number {
    return Math.floor(this.clock() / 1000);
  }
}
