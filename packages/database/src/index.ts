// ──────────────────────────────────────────────
// Coachgate - Database Package
// ──────────────────────────────────────────────

export * from "./schema/index.js";
export { getDatabase, createConnection, closeConnection } from "./connection.js";
export type { Database } from "./connection.js";
export { createUserRepository, isUniqueViolation } from "./user-repository.js";
export type { UserRepository, CreateUserResult, UserPreferencesPatch } from "./user-repository.js";
