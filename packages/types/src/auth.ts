// ──────────────────────────────────────────────
// Coachgate - User & Auth Types
// ──────────────────────────────────────────────

import type { AiProviderId } from "./llm.js";

export const PROGRAMMING_LANGUAGES = [
  "python",
  "typescript",
  "javascript",
  "go",
  "rust",
  "java",
  "cpp",
  "csharp",
] as const;

export type ProgrammingLanguage = (typeof PROGRAMMING_LANGUAGES)[number];

export const DEFAULT_LANGUAGE: ProgrammingLanguage = "python";

export interface User {
  id: string;
  email: string;
  passwordHash: string;
  preferredAiProvider: AiProviderId;
  preferredLanguage: ProgrammingLanguage;
  isActive: boolean;
  lastLoginAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export type PublicUser = Omit<User, "passwordHash">;

export interface NewUser {
  email: string;
  passwordHash: string;
  preferredAiProvider: AiProviderId;
  preferredLanguage: ProgrammingLanguage;
}

export type TokenType = "access" | "refresh";

export interface TokenClaims {
  sub: string;
  email: string;
  typ: TokenType;
  jti: string;
  sid: string;
  iat: number;
  exp: number;
  iss: string;
  aud: string;
}

export interface TokenPair {
  accessToken: string;
  refreshToken: string;
  tokenType: "bearer";
  expiresIn: number;
}

export interface RegisterInput {
  email: string;
  password: string;
  preferredAiProvider?: string;
  preferredLanguage?: ProgrammingLanguage;
}

export interface LoginInput {
  email: string;
  password: string;
}

export interface PreferencesUpdate {
  preferredAiProvider?: string;
  preferredLanguage?: ProgrammingLanguage;
}

export interface AuthResult {
  user: PublicUser;
  tokens: TokenPair;
}
