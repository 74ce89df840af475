import type { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { env } from '../config/env.js';
import { isRecord } from '../core/row-values.js';
import type { JwtPayload } from '../types/auth.js';

// Extend Express Request type to include user
export interface AuthRequest extends Request {
  user?: JwtPayload;
}

function toJwtPayload(decoded: unknown): JwtPayload | null {
  if (!isRecord(decoded) || typeof decoded.userId !== 'string' || !decoded.userId) {
    return null;
  }
  return {
    userId: decoded.userId,
    email: typeof decoded.email === 'string' ? decoded.email : undefined
  };
}

export const authenticate = (req: AuthRequest, res: Response, next: NextFunction) => {
  const authHeader = req.headers.authorization;
  const token = authHeader && authHeader.split(' ')[1]; // Bearer <token>

  if (!token) {
    return res.status(401).json({ success: false, error: 'Unauthorized', details: 'No token provided' });
  }

  let payload: JwtPayload | null;
  try {
    payload = toJwtPayload(jwt.verify(token, env.JWT_SECRET));
  } catch {
    payload = null;
  }

  if (!payload) {
    return res.status(403).json({ success: false, error: 'Forbidden', details: 'Invalid or expired token' });
  }

  req.user = payload; // userId, email
  next();
};
