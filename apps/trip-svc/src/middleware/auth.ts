import { NextFunction, Request, Response } from 'express';
import { AuthenticationError, User } from '@tripplanner/shared';
import { AccountService } from '../services/accountService';

export interface Session {
  user: User;
  token: string;
}

const sessions = new WeakMap<Request, Session>();

export function bearerToken(req: Request): string | null {
  const authHeader = req.header('authorization');
  if (!authHeader || !authHeader.startsWith('Bearer ')) {
    return null;
  }
  const token = authHeader.slice('Bearer '.length).trim();
  return token === '' ? null : token;
}

/**
 * Rejects requests without a valid, unrevoked access token for an active user.
 */
export function requireUser(accounts: AccountService) {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const token = bearerToken(req);
      if (!token) {
        res.setHeader('WWW-Authenticate', 'Bearer');
        throw new AuthenticationError('Not authenticated');
      }
      const user = await accounts.authenticate(token);
      sessions.set(req, { user, token });
      next();
    } catch (error) {
      if (error instanceof AuthenticationError) {
        res.setHeader('WWW-Authenticate', 'Bearer');
      }
      next(error);
    }
  };
}

export function sessionOf(req: Request): Session {
  const session = sessions.get(req);
  if (!session) {
    throw new AuthenticationError('Not authenticated');
  }
  return session;
}
