// ──────────────────────────────────────────────
// Coachgate - Shared Types
// ──────────────────────────────────────────────

export * from "./auth.js";
export * from "./llm.js";
export * from "./api.js";
