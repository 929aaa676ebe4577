// ──────────────────────────────────────────────
// Coachgate - Database Schema Index
// ──────────────────────────────────────────────

export { users } from "./users.js";
