import { eq } from "drizzle-orm";
import { DrizzleDB } from "../db/client";
import { users, type User } from "../db/schema";

export const DEFAULT_TIMEZONE = "UTC";

/**
 * Check a timezone name against the runtime's IANA database.
 */
export function isValidTimezone(timezone: string): boolean {
  if (!timezone) return false;
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: timezone });
    return true;
  } catch (error) {
    if (error instanceof RangeError) return false;
    throw error;
  }
}

export interface NewUser {
  chatUserId: string;
  username?: string;
  firstName?: string;
  lastName?: string;
  timezone?: string;
}

export interface PreferenceUpdate {
  notificationTime?: string;
  notificationEnabled?: boolean;
  timezone?: string;
}

/**
 * Get a user by chat-side id.
 */
export function getUser(db: DrizzleDB, chatUserId: string): User | null {
  return (
    db.select().from(users).where(eq(users.chatUserId, chatUserId)).get() ??
    null
  );
}

/**
 * Create a new user. An unknown timezone falls back to UTC.
 */
export function createUser(db: DrizzleDB, user: NewUser): User {
  const now = new Date();
  const timezone =
    user.timezone && isValidTimezone(user.timezone)
      ? user.timezone
      : DEFAULT_TIMEZONE;

  return db
    .insert(users)
    .values({
      chatUserId: user.chatUserId,
      username: user.username ?? null,
      firstName: user.firstName ?? null,
      lastName: user.lastName ?? null,
      timezone,
      createdAt: now,
      lastActive: now,
    })
    .returning()
    .get();
}

/**
 * Touch the user's last-active timestamp.
 * @returns The updated user, or null if unknown
 */
export function updateUserActivity(
  db: DrizzleDB,
  chatUserId: string
): User | null {
  return (
    db
      .update(users)
      .set({ lastActive: new Date() })
      .where(eq(users.chatUserId, chatUserId))
      .returning()
      .get() ?? null
  );
}

/**
 * Update notification and timezone preferences.
 * An unknown timezone is ignored; other fields still apply.
 * @returns The updated user, or null if unknown
 */
export function updateUserPreferences(
  db: DrizzleDB,
  chatUserId: string,
  update: PreferenceUpdate
): User | null {
  const user = getUser(db, chatUserId);
  if (!user) return null;

  const changes: Partial<Pick<User, "notificationTime" | "notificationEnabled" | "timezone">> = {};

  if (update.notificationTime !== undefined) {
    changes.notificationTime = update.notificationTime;
  }
  if (update.notificationEnabled !== undefined) {
    changes.notificationEnabled = update.notificationEnabled;
  }
  if (update.timezone !== undefined && isValidTimezone(update.timezone)) {
    changes.timezone = update.timezone;
  }

  if (Object.keys(changes).length === 0) {
    return user;
  }

  return (
    db
      .update(users)
      .set(changes)
      .where(eq(users.id, user.id))
      .returning()
      .get() ?? null
  );
}
