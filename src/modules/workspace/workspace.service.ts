import { z } from 'zod';
import { queryMetadata } from '../../config/database.js';
import { decrypt, encrypt } from '../../core/encryption.js';

export const ConnectionProfileSchema = z.object({
  account: z.string().min(1, 'account is required'),
  username: z.string().min(1, 'username is required'),
  password: z.string().min(1, 'password is required'),
  database: z.string().min(1).optional(),
  schema: z.string().min(1).optional(),
  warehouse: z.string().min(1).optional(),
  role: z.string().min(1).optional(),
  authenticator: z.string().min(1).default('SNOWFLAKE')
});

export type ConnectionProfile = z.infer<typeof ConnectionProfileSchema>;

export interface ConnectionSummary {
  id: string;
  label: string;
  is_active: boolean;
}

export class NoActiveConnectionError extends Error {
  constructor() {
    super('No active warehouse connection found. Please select or add one.');
    this.name = 'NoActiveConnectionError';
  }
}

export const getActiveConnectionForUser = async (userId: string): Promise<string> => {
  const res = await queryMetadata<{ encrypted_profile: string }>(
    'SELECT encrypted_profile FROM user_connections WHERE user_id = $1 AND is_active = true LIMIT 1',
    [userId]
  );

  const row = res.rows[0];
  if (!row) {
    throw new NoActiveConnectionError();
  }

  return row.encrypted_profile;
};

export const encryptProfile = (profile: ConnectionProfile): string => encrypt(JSON.stringify(profile));

/**
 * Decrypt a stored profile and re-validate it; stored rows predate schema changes.
 */
export const decryptProfile = (encryptedProfile: string): ConnectionProfile => {
  const raw: unknown = JSON.parse(decrypt(encryptedProfile));
  return ConnectionProfileSchema.parse(raw);
};

export const countConnections = async (userId: string): Promise<number> => {
  const res = await queryMetadata<{ count: number }>(
    'SELECT COUNT(*)::int AS count FROM user_connections WHERE user_id = $1',
    [userId]
  );
  return res.rows[0]?.count ?? 0;
};

export const saveConnection = async (
  userId: string,
  label: string,
  profile: ConnectionProfile,
  isActive: boolean
): Promise<void> => {
  await queryMetadata(
    `INSERT INTO user_connections (user_id, label, encrypted_profile, is_active)
     VALUES ($1, $2, $3, $4)`,
    [userId, label, encryptProfile(profile), isActive]
  );
};

export const listConnectionsForUser = async (userId: string): Promise<ConnectionSummary[]> => {
  const result = await queryMetadata<ConnectionSummary>(
    'SELECT id, label, is_active FROM user_connections WHERE user_id = $1 ORDER BY created_at DESC',
    [userId]
  );
  return result.rows;
};

/**
 * Mark one profile active and every other profile of the user inactive.
 * Returns false when the profile does not belong to the user.
 */
export const activateConnection = async (userId: string, connectionId: string): Promise<boolean> => {
  const owned = await queryMetadata(
    'SELECT id FROM user_connections WHERE id = $1 AND user_id = $2',
    [connectionId, userId]
  );
  if (owned.rowCount === 0) {
    return false;
  }

  await queryMetadata('UPDATE user_connections SET is_active = false WHERE user_id = $1', [userId]);
  await queryMetadata('UPDATE user_connections SET is_active = true WHERE id = $1 AND user_id = $2', [
    connectionId,
    userId
  ]);
  return true;
};
