import crypto from 'node:crypto';
import { eq } from 'drizzle-orm';
import type { UserRole } from '@regadmin/shared';
import type { Database } from '../db/client.js';
import { sessions, users } from '../db/schema/index.js';

export const SESSION_EXPIRY_DAYS = 7;

export type UserRecord = typeof users.$inferSelect;

export interface UserProfile {
  email: string;
  name: string;
  role: UserRole;
}

/**
 * User and session persistence behind the session-cookie guard.
 * Only SHA-256 hashes of session tokens are stored.
 */
export interface AuthStore {
  upsertUser(profile: UserProfile): Promise<UserRecord>;
  /** Returns the raw token to hand to the client. */
  createSession(userId: string): Promise<string>;
  /** Null when the token is unknown or expired. */
  validateSession(token: string): Promise<UserRecord | null>;
  deleteSession(token: string): Promise<void>;
}

export function hashToken(token: string): string {
  return crypto.createHash('sha256').update(token).digest('hex');
}

export function generateSessionToken(): string {
  return crypto.randomBytes(32).toString('hex');
}

export function sessionExpiry(from: Date = new Date()): Date {
  const expiresAt = new Date(from);
  expiresAt.setDate(expiresAt.getDate() + SESSION_EXPIRY_DAYS);
  return expiresAt;
}

export class DrizzleAuthStore implements AuthStore {
  constructor(private readonly db: Database) {}

  async upsertUser(profile: UserProfile): Promise<UserRecord> {
    const result = await this.db
      .insert(users)
      .values(profile)
      .onConflictDoUpdate({
        target: users.email,
        set: { name: profile.name, role: profile.role, updatedAt: new Date() },
      })
      .returning();

    return result[0];
  }

  async createSession(userId: string): Promise<string> {
    const rawToken = generateSessionToken();

    await this.db.insert(sessions).values({
      userId,
      tokenHash: hashToken(rawToken),
      expiresAt: sessionExpiry(),
    });

    return rawToken;
  }

  async validateSession(token: string): Promise<UserRecord | null> {
    const result = await this.db
      .select({
        session: sessions,
        user: users,
      })
      .from(sessions)
      .innerJoin(users, eq(sessions.userId, users.id))
      .where(eq(sessions.tokenHash, hashToken(token)))
      .limit(1);

    if (result.length === 0) {
      return null;
    }

    const { session, user } = result[0];

    if (new Date() > session.expiresAt) {
      await this.db.delete(sessions).where(eq(sessions.id, session.id));
      return null;
    }

    return user;
  }

  async deleteSession(token: string): Promise<void> {
    await this.db.delete(sessions).where(eq(sessions.tokenHash, hashToken(token)));
  }
}
