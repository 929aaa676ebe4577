// ──────────────────────────────────────────────
// Coachgate - User Repository
// ──────────────────────────────────────────────

import { eq, sql } from "drizzle-orm";
import type { AiProviderId, NewUser, ProgrammingLanguage, User } from "@coachgate/types";
import type { Database } from "./connection.js";
import { users } from "./schema/index.js";

const UNIQUE_VIOLATION = "23505";

export type CreateUserResult =
  | { created: true; user: User }
  | { created: false; reason: "duplicate_email" };

export interface UserPreferencesPatch {
  preferredAiProvider?: AiProviderId;
  preferredLanguage?: ProgrammingLanguage;
}

/**
 * Persistence boundary for user records. Emails passed in are expected to be
 * normalized already; implementations must guarantee that two concurrent
 * `create` calls for one email yield exactly one `created: true`.
 */
export interface UserRepository {
  findByEmail(email: string): Promise<User | null>;
  findById(id: string): Promise<User | null>;
  create(input: NewUser): Promise<CreateUserResult>;
  recordLogin(id: string, at: Date): Promise<void>;
  updatePreferences(id: string, patch: UserPreferencesPatch): Promise<User | null>;
  ping(): Promise<void>;
}

// postgres.js raises the violation directly; newer drizzle releases wrap it in `cause`
export function isUniqueViolation(error: unknown): boolean {
  let current: unknown = error;
  for (let depth = 0; depth < 5 && current instanceof Error; depth++) {
    if ("code" in current && current.code === UNIQUE_VIOLATION) {
      return true;
    }
    current = current.cause;
  }
  return false;
}

export function createUserRepository(db: Database): UserRepository {
  return {
    async findByEmail(email) {
      const [user] = await db.select().from(users).where(eq(users.email, email)).limit(1);
      return user ?? null;
    },

    async findById(id) {
      const [user] = await db.select().from(users).where(eq(users.id, id)).limit(1);
      return user ?? null;
    },

    async create(input) {
      try {
        const [user] = await db.insert(users).values(input).returning();
        if (!user) {
          throw new Error("Failed to create user");
        }
        return { created: true, user };
      } catch (err) {
        if (isUniqueViolation(err)) {
          return { created: false, reason: "duplicate_email" };
        }
        throw err;
      }
    },

    async recordLogin(id, at) {
      await db.update(users).set({ lastLoginAt: at, updatedAt: at }).where(eq(users.id, id));
    },

    async updatePreferences(id, patch) {
      const [user] = await db
        .update(users)
        .set({ ...patch, updatedAt: new Date() })
        .where(eq(users.id, id))
        .returning();
      return user ?? null;
    },

    async ping() {
      await db.execute(sql`select 1`);
    },
  };
}
