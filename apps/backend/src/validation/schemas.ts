// ──────────────────────────────────────────────
// Coachgate - Zod Validation Schemas
// ──────────────────────────────────────────────

import { z } from "zod";
import { PROGRAMMING_LANGUAGES } from "@coachgate/types";
import { ValidationError } from "../errors.js";

// Auth schemas
export const registerSchema = z
  .object({
    email: z.string().trim().max(254, "Email must be at most 254 characters").email("Invalid email address"),
    password: z.string().min(1, "Password is required").max(128, "Password must be at most 128 characters"),
    confirm_password: z.string().nullish(),
    // Unknown or unconfigured providers fall back to the default rather than failing
    preferred_ai_provider: z.string().max(50).nullish(),
    preferred_language: z.enum(PROGRAMMING_LANGUAGES).nullish(),
  })
  .refine((value) => (value.confirm_password ?? value.password) === value.password, {
    message: "Passwords do not match",
    path: ["confirm_password"],
  });

export const loginSchema = z.object({
  email: z.string().trim().max(254).email("Invalid email address"),
  password: z.string().min(1, "Password is required").max(128),
});

export const refreshSchema = z.object({
  refresh_token: z.string().min(1, "Refresh token is required"),
});

export const updatePreferencesSchema = z
  .object({
    preferred_ai_provider: z.string().max(50).optional(),
    preferred_language: z.enum(PROGRAMMING_LANGUAGES).optional(),
  })
  .refine(
    (value) => value.preferred_ai_provider !== undefined || value.preferred_language !== undefined,
    { message: "At least one preference must be provided" }
  );

// AI schemas
export const completionSchema = z.object({
  prompt: z.string().min(1, "Prompt is required").max(32000),
  system_prompt: z.string().max(8000).optional(),
  max_tokens: z.number().int().min(1).max(8192).optional(),
});

export function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const flattened = parsed.error.flatten();
    const message =
      flattened.formErrors[0] ?? Object.values(flattened.fieldErrors).flat()[0] ?? "Invalid input";
    throw new ValidationError(message, flattened.fieldErrors);
  }
  return parsed.data;
}
