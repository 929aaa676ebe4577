// ──────────────────────────────────────────────
// Coachgate - Users Table Schema
// ──────────────────────────────────────────────

import { pgTable, uuid, varchar, boolean, timestamp, uniqueIndex } from "drizzle-orm/pg-core";
import type { AiProviderId, ProgrammingLanguage } from "@coachgate/types";

export const users = pgTable(
  "users",
  {
    id: uuid("id").defaultRandom().primaryKey(),
    // Stored trimmed and lower-cased; uniqueness is enforced on this column
    email: varchar("email", { length: 254 }).notNull(),
    passwordHash: varchar("password_hash", { length: 255 }).notNull(),
    preferredAiProvider: varchar("preferred_ai_provider", { length: 20 })
      .$type<AiProviderId>()
      .notNull(),
    preferredLanguage: varchar("preferred_language", { length: 50 })
      .$type<ProgrammingLanguage>()
      .default("python")
      .notNull(),
    isActive: boolean("is_active").default(true).notNull(),
    lastLoginAt: timestamp("last_login_at", { withTimezone: true }),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    emailIdx: uniqueIndex("users_email_unique_idx").on(table.email),
  })
);
