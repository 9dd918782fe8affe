import { z } from "zod";
import { UserInputError } from "./errors.js";

export const DEFAULT_OSC52_MAX_ENCODED_SIZE = 75_000;
export const DEFAULT_COMMAND_TIMEOUT_MS = 5_000;

// setTimeout clamps longer delays to 1ms.
export const MAX_COMMAND_TIMEOUT_MS = 2_147_483_647;

const TRUTHY_VALUES = ["1", "true", "yes", "on"];

const flagSchema = z
  .string()
  .optional()
  .transform(value => value !== undefined && TRUTHY_VALUES.includes(value.trim().toLowerCase()));

function positiveIntegerSchema(
  variable: string,
  fallback: number,
  max: number = Number.MAX_SAFE_INTEGER,
) {
  return z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value.trim() === "") {
        return fallback;
      }
      const trimmed = value.trim();
      const parsed = /^\d+$/.test(trimmed) ? Number(trimmed) : NaN;
      if (!Number.isSafeInteger(parsed) || parsed <= 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `${variable} must be a positive integer, got "${value}"`,
        });
        return z.NEVER;
      }
      if (parsed > max) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `${variable} must be at most ${max}, got "${value}"`,
        });
        return z.NEVER;
      }
      return parsed;
    });
}

const termclipEnvSchema = z.object({
  TERMCLIP_FORCE_OSC52: flagSchema,
  TERMCLIP_FORCE_NATIVE: flagSchema,
  TERMCLIP_OSC52_MAX_B64: positiveIntegerSchema(
    "TERMCLIP_OSC52_MAX_B64",
    DEFAULT_OSC52_MAX_ENCODED_SIZE,
  ),
  TERMCLIP_DEBUG: flagSchema,
  TERMCLIP_TIMEOUT_MS: positiveIntegerSchema(
    "TERMCLIP_TIMEOUT_MS",
    DEFAULT_COMMAND_TIMEOUT_MS,
    MAX_COMMAND_TIMEOUT_MS,
  ),
});

/**
 * Overrides read from the environment once per run.
 */
export interface TermclipConfig {
  readonly forceOsc52: boolean;
  readonly forceNative: boolean;
  readonly maxEncodedSize: number;
  readonly debug: boolean;
  readonly commandTimeoutMs: number;
}

export type EnvSnapshot = Readonly<Record<string, string | undefined>>;

export function readConfig(env: EnvSnapshot): TermclipConfig {
  const result = termclipEnvSchema.safeParse(env);
  if (!result.success) {
    throw new UserInputError(result.error.issues.map(issue => issue.message).join("\n"));
  }
  const parsed = result.data;
  return Object.freeze({
    forceOsc52: parsed.TERMCLIP_FORCE_OSC52,
    forceNative: parsed.TERMCLIP_FORCE_NATIVE,
    maxEncodedSize: parsed.TERMCLIP_OSC52_MAX_B64,
    debug: parsed.TERMCLIP_DEBUG,
    commandTimeoutMs: parsed.TERMCLIP_TIMEOUT_MS,
  });
}
