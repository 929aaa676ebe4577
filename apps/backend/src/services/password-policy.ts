// ──────────────────────────────────────────────
// Coachgate - Password Strength Policy
// ──────────────────────────────────────────────

import type { PasswordPolicyConfig } from "@coachgate/utils";

export const SPECIAL_CHARACTERS = "!@#$%^&*()_+-=[]{}|;:,.<>?";

// bcrypt ignores everything past this many UTF-8 bytes
export const BCRYPT_MAX_PASSWORD_BYTES = 72;

export function exceedsBcryptLimit(password: string): boolean {
  return Buffer.byteLength(password, "utf8") > BCRYPT_MAX_PASSWORD_BYTES;
}

export interface PasswordRule {
  id: "min_length" | "max_length" | "max_bytes" | "uppercase" | "lowercase" | "digit" | "special";
  message: string;
  test(password: string): boolean;
}

export interface PasswordPolicy {
  readonly rules: readonly PasswordRule[];
  /** Messages of every rule the password breaks; empty when it passes. */
  check(password: string): string[];
}

export function createPasswordPolicy(config: PasswordPolicyConfig): PasswordPolicy {
  if (config.maxLength < config.minLength) {
    throw new Error(
      `Password max length (${config.maxLength}) must not be below min length (${config.minLength})`
    );
  }

  const rules: PasswordRule[] = [
    {
      id: "min_length",
      message: `Password must be at least ${config.minLength} characters long`,
      test: (password) => password.length >= config.minLength,
    },
    {
      id: "max_length",
      message: `Password must be at most ${config.maxLength} characters long`,
      test: (password) => password.length <= config.maxLength,
    },
    {
      id: "max_bytes",
      message: `Password must be at most ${BCRYPT_MAX_PASSWORD_BYTES} bytes long`,
      test: (password) => !exceedsBcryptLimit(password),
    },
  ];

  if (config.requireUppercase) {
    rules.push({
      id: "uppercase",
      message: "Password must contain at least one uppercase letter",
      test: (password) => /[A-Z]/.test(password),
    });
  }
  if (config.requireLowercase) {
    rules.push({
      id: "lowercase",
      message: "Password must contain at least one lowercase letter",
      test: (password) => /[a-z]/.test(password),
    });
  }
  if (config.requireDigit) {
    rules.push({
      id: "digit",
      message: "Password must contain at least one number",
      test: (password) => /[0-9]/.test(password),
    });
  }
  if (config.requireSpecial) {
    rules.push({
      id: "special",
      message: "Password must contain at least one special character",
      test: (password) => [...password].some((char) => SPECIAL_CHARACTERS.includes(char)),
    });
  }

  return {
    rules: Object.freeze(rules),
    check(password) {
      return rules.filter((rule) => !rule.test(password)).map((rule) => rule.message);
    },
  };
}
