import { z } from "zod";

type EnvLookupOptions = {
  fallbacks?: string[];
  format?: (value: string) => string;
};

const readEnv = (
  key: string,
  options: EnvLookupOptions | string[] = {},
): string | undefined => {
  const normalizedOptions = Array.isArray(options) ? { fallbacks: options } : options;
  const { fallbacks = [], format } = normalizedOptions;
  const keys = [key, ...fallbacks];
  const sourceEnv =
    typeof process !== "undefined" && process && typeof process.env === "object"
      ? process.env
      : undefined;

  for (const candidate of keys) {
    const raw = sourceEnv?.[candidate];
    if (typeof raw !== "string") continue;
    const trimmed = raw.trim();
    if (!trimmed.length) continue;
    return format ? format(trimmed) : trimmed;
  }
  return undefined;
};

const optionalString = z.string().optional().transform((value) => value ?? null);
const optionalUrl = z
  .string()
  .url()
  .optional()
  .transform((value) => (value ? value.replace(/\/$/, "") : null));

const positiveInteger = (fallback: number) =>
  z.preprocess(
    (value) => {
      if (typeof value !== "string") return undefined;
      const parsed = Number(value);
      if (!Number.isFinite(parsed) || parsed <= 0) return undefined;
      return Math.floor(parsed);
    },
    z.number().int().positive().default(fallback),
  );

const sampleRate = z.preprocess(
  (value) => {
    if (typeof value !== "string") return undefined;
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  },
  z.number().min(0).max(1).default(0.05),
);

const vendorName = (fallback: string) =>
  z
    .string()
    .optional()
    .transform((value) => (value ?? fallback).toLowerCase());

export const serverEnvSchema = z
  .object({
    NODE_ENV: z.string().default("development"),
    PORT: positiveInteger(3001),
    SUPABASE_URL: optionalUrl,
    SUPABASE_SERVICE_ROLE_KEY: optionalString,
    SUPABASE_ANON_KEY: optionalString,
    CHAT_STORE_VENDOR: vendorName("supabase"),
    AUTH_VENDOR: vendorName("supabase"),
    CHAT_OFFLINE_GRACE_MS: positiveInteger(5_000),
    CHAT_TYPING_TTL_MS: positiveInteger(6_000),
    CHAT_IDLE_TIMEOUT_MS: positiveInteger(60_000),
    CHAT_HEARTBEAT_INTERVAL_MS: positiveInteger(25_000),
    CHAT_MEMBERS_CACHE_TTL_MS: positiveInteger(30_000),
    CHAT_MAX_PROTOCOL_VIOLATIONS: positiveInteger(5),
    CHAT_MAX_BUFFERED_BYTES: positiveInteger(1024 * 1024),
    CHAT_MAX_FRAME_BYTES: positiveInteger(64 * 1024),
    SENTRY_DSN: optionalString,
    SENTRY_ENVIRONMENT: optionalString,
    SENTRY_TRACES_SAMPLE_RATE: sampleRate,
  })
  .superRefine((env, ctx) => {
    const needsSupabase = env.CHAT_STORE_VENDOR === "supabase" || env.AUTH_VENDOR === "supabase";
    if (!needsSupabase) return;
    if (!env.SUPABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["SUPABASE_URL"],
        message: "SUPABASE_URL is required for the supabase vendor",
      });
    }
    if (!env.SUPABASE_SERVICE_ROLE_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["SUPABASE_SERVICE_ROLE_KEY"],
        message: "SUPABASE_SERVICE_ROLE_KEY is required for the supabase vendor",
      });
    }
  });

const rawServerEnv = {
  NODE_ENV: readEnv("NODE_ENV"),
  PORT: readEnv("PORT", ["CHAT_PORT"]),
  SUPABASE_URL: readEnv("SUPABASE_URL"),
  SUPABASE_SERVICE_ROLE_KEY: readEnv("SUPABASE_SERVICE_ROLE_KEY", [
    "SUPABASE_SERVICE_ROLE",
    "SUPABASE_SERVICE_KEY",
  ]),
  SUPABASE_ANON_KEY: readEnv("SUPABASE_ANON_KEY"),
  CHAT_STORE_VENDOR: readEnv("CHAT_STORE_VENDOR", ["DATABASE_VENDOR"]),
  AUTH_VENDOR: readEnv("AUTH_VENDOR"),
  CHAT_OFFLINE_GRACE_MS: readEnv("CHAT_OFFLINE_GRACE_MS"),
  CHAT_TYPING_TTL_MS: readEnv("CHAT_TYPING_TTL_MS"),
  CHAT_IDLE_TIMEOUT_MS: readEnv("CHAT_IDLE_TIMEOUT_MS"),
  CHAT_HEARTBEAT_INTERVAL_MS: readEnv("CHAT_HEARTBEAT_INTERVAL_MS"),
  CHAT_MEMBERS_CACHE_TTL_MS: readEnv("CHAT_MEMBERS_CACHE_TTL_MS"),
  CHAT_MAX_PROTOCOL_VIOLATIONS: readEnv("CHAT_MAX_PROTOCOL_VIOLATIONS"),
  CHAT_MAX_BUFFERED_BYTES: readEnv("CHAT_MAX_BUFFERED_BYTES"),
  CHAT_MAX_FRAME_BYTES: readEnv("CHAT_MAX_FRAME_BYTES"),
  SENTRY_DSN: readEnv("SENTRY_DSN"),
  SENTRY_ENVIRONMENT: readEnv("SENTRY_ENVIRONMENT"),
  SENTRY_TRACES_SAMPLE_RATE: readEnv("SENTRY_TRACES_SAMPLE_RATE"),
} satisfies Record<string, string | undefined>;

const parsedServerEnv = serverEnvSchema.safeParse(rawServerEnv);

if (!parsedServerEnv.success) {
  const formattedErrors = parsedServerEnv.error.flatten();
  const details = Object.entries(formattedErrors.fieldErrors)
    .map(([field, issues]) => `${field}: ${issues?.join(", ") ?? "invalid"}`)
    .join("; ");
  throw new Error(`Invalid server environment configuration: ${details}`);
}

const envData = parsedServerEnv.data;
export const serverEnv = Object.freeze(envData);
export type ServerEnv = typeof serverEnv;
