import type { Request, Response } from 'express';
import bcrypt from 'bcrypt';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { queryMetadata } from '../../config/database.js';
import { env } from '../../config/env.js';

// Input Validation Schema
const AuthSchema = z.object({
  email: z.string().email('Invalid email format'),
  password: z.string().min(8, 'Password must be at least 8 characters'),
});

interface UserRow {
  id: string;
  email: string;
  password: string;
}

function invalidRequest(res: Response, error: z.ZodError): Response {
  return res.status(400).json({
    success: false,
    error: 'Invalid request',
    details: error.issues.map((issue) => issue.message).join(', ')
  });
}

/**
 * POST /api/auth/login
 */
export const login = async (req: Request, res: Response): Promise<Response | void> => {
  const validation = AuthSchema.safeParse(req.body);
  if (!validation.success) {
    return invalidRequest(res, validation.error);
  }

  try {
    const { email, password } = validation.data;
    const userRes = await queryMetadata<UserRow>('SELECT id, email, password FROM users WHERE email = $1', [email]);
    const user = userRes.rows[0];

    if (!user || !(await bcrypt.compare(password, user.password))) {
      return res.status(401).json({ success: false, error: 'Unauthorized', details: 'Invalid email or password' });
    }

    const token = jwt.sign({ userId: user.id, email: user.email }, env.JWT_SECRET, { expiresIn: '24h' });

    return res.json({
      success: true,
      data: { token, user: { id: user.id, email: user.email } }
    });
  } catch (error) {
    console.error(`[${new Date().toISOString()}] [AUTH-CONTROLLER] [login] ${error instanceof Error ? error.message : 'Unknown error'}`);
    return res.status(500).json({ success: false, error: 'Authentication failed', details: 'Internal server error' });
  }
};

/**
 * POST /api/auth/register
 */
export const register = async (req: Request, res: Response): Promise<Response | void> => {
  const validation = AuthSchema.safeParse(req.body);
  if (!validation.success) {
    return invalidRequest(res, validation.error);
  }

  try {
    const { email, password } = validation.data;
    const existingUser = await queryMetadata('SELECT id FROM users WHERE email = $1', [email]);
    if ((existingUser.rowCount ?? 0) > 0) {
      return res.status(409).json({ success: false, error: 'Conflict', details: 'User already exists' });
    }

    const hashedPassword = await bcrypt.hash(password, 12);
    const result = await queryMetadata<Pick<UserRow, 'id' | 'email'>>(
      'INSERT INTO users (email, password) VALUES ($1, $2) RETURNING id, email',
      [email, hashedPassword]
    );

    return res.status(201).json({ success: true, data: { user: result.rows[0] } });
  } catch (error) {
    console.error(`[${new Date().toISOString()}] [AUTH-CONTROLLER] [register] ${error instanceof Error ? error.message : 'Unknown error'}`);
    return res.status(500).json({ success: false, error: 'Registration failed', details: 'Internal server error' });
  }
};
