import { NextFunction, Request, Response } from 'express';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import type { ForumUser } from '@chromedome/shared';
import { ForumRepository } from '../database/types.js';
import { HTTP_ERRORS } from '../utils/error-messages.js';
import { Logger } from '../utils/logger.js';

export interface AuthRequest extends Request {
  userId?: string;
  user?: ForumUser;
}

const TokenPayloadSchema = z.object({
  userId: z.string().min(1)
});

// Tokens are issued by the external auth service; this helper mints them for tools and tests
export function generateToken(userId: string, secret: string): string {
  return jwt.sign({ userId }, secret, { expiresIn: '7d' });
}

export function verifyToken(token: string, secret: string): { userId: string } | null {
  try {
    const parsed = TokenPayloadSchema.safeParse(jwt.verify(token, secret));
    return parsed.success ? { userId: parsed.data.userId } : null;
  } catch {
    return null;
  }
}

export function authenticateToken(secret: string) {
  return (req: AuthRequest, res: Response, next: NextFunction): void => {
    const authHeader = req.headers['authorization'];
    const token = authHeader && authHeader.split(' ')[1];

    if (!token) {
      res.status(401).json({ error: HTTP_ERRORS.NO_TOKEN });
      return;
    }

    const payload = verifyToken(token, secret);
    if (!payload) {
      res.status(403).json({ error: HTTP_ERRORS.INVALID_TOKEN });
      return;
    }

    req.userId = payload.userId;
    next();
  };
}

/** Loads the forum user named by the token; unknown users are rejected. */
export function requireForumUser(repo: ForumRepository) {
  return async (req: AuthRequest, res: Response, next: NextFunction): Promise<void> => {
    try {
      const user = req.userId ? await repo.getUser(req.userId) : null;
      if (!user) {
        res.status(401).json({ error: HTTP_ERRORS.USER_NOT_FOUND });
        return;
      }
      req.user = user;
      next();
    } catch (error) {
      Logger.error('[Auth] User lookup failed:', error);
      res.status(500).json({ error: HTTP_ERRORS.INTERNAL });
    }
  };
}
