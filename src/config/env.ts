import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const requiredString = (field: string) =>
  z
    .string()
    .trim()
    .min(1, { message: `${field} must not be empty` });

const urlString = (field: string) =>
  requiredString(field).refine(
    (value) => {
      try {
        new URL(value);
        return true;
      } catch {
        return false;
      }
    },
    { message: `${field} must be a valid URL` }
  );

const EnvSchema = z.object({
  GATEWAY_HOST: requiredString("GATEWAY_HOST").default("127.0.0.1"),
  GATEWAY_PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  GATEWAY_LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  GATEWAY_LOG_FILE: z.string().trim().optional(),

  GATEWAY_API_KEYS_FILE: requiredString("GATEWAY_API_KEYS_FILE").default("api_keys.json"),
  GATEWAY_MAIL_TOKEN_FILE: requiredString("GATEWAY_MAIL_TOKEN_FILE").default("token.json"),
  GATEWAY_CALENDAR_TOKEN_FILE: requiredString("GATEWAY_CALENDAR_TOKEN_FILE").default("token.json"),

  GATEWAY_CONFIRMATION_MODE: z.enum(["none", "mutating", "all"]).default("mutating"),
  GATEWAY_CONFIRMATION_DELIVERY: z.enum(["console", "web"]).default("console"),
  GATEWAY_CONFIRMATION_TIMEOUT_SECONDS: z.coerce.number().min(0).max(86_400).default(300),

  GATEWAY_MAIL_API_BASE_URL: urlString("GATEWAY_MAIL_API_BASE_URL").default("https://gmail.googleapis.com/gmail/v1"),
  GATEWAY_CALENDAR_API_BASE_URL: urlString("GATEWAY_CALENDAR_API_BASE_URL").default(
    "https://www.googleapis.com/calendar/v3"
  ),
  GATEWAY_BACKEND_TIMEOUT_MS: z.coerce.number().int().min(1_000).max(120_000).default(30_000),

  GATEWAY_SSE_KEEPALIVE_MS: z.coerce.number().int().min(1_000).max(300_000).default(30_000),
  GATEWAY_SUBSCRIBER_BUFFER: z.coerce.number().int().min(1).max(10_000).default(100),
});

export type GatewayEnv = z.infer<typeof EnvSchema>;

/** Seconds to milliseconds; a zero timeout means "wait forever". */
export function confirmationTimeoutMs(env: GatewayEnv): number | null {
  return env.GATEWAY_CONFIRMATION_TIMEOUT_SECONDS > 0
    ? Math.round(env.GATEWAY_CONFIRMATION_TIMEOUT_SECONDS * 1000)
    : null;
}

export function readEnv(source: NodeJS.ProcessEnv = process.env): GatewayEnv {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const message = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid gateway env: ${message}`);
  }
  return parsed.data;
}

export function redactEnvForLogs(env: GatewayEnv): Record<string, string | number | boolean | null> {
  return {
    GATEWAY_HOST: env.GATEWAY_HOST,
    GATEWAY_PORT: env.GATEWAY_PORT,
    GATEWAY_LOG_LEVEL: env.GATEWAY_LOG_LEVEL,
    GATEWAY_LOG_FILE: env.GATEWAY_LOG_FILE ?? null,
    GATEWAY_API_KEYS_FILE: env.GATEWAY_API_KEYS_FILE,
    GATEWAY_MAIL_TOKEN_FILE: env.GATEWAY_MAIL_TOKEN_FILE,
    GATEWAY_CALENDAR_TOKEN_FILE: env.GATEWAY_CALENDAR_TOKEN_FILE,
    GATEWAY_CONFIRMATION_MODE: env.GATEWAY_CONFIRMATION_MODE,
    GATEWAY_CONFIRMATION_DELIVERY: env.GATEWAY_CONFIRMATION_DELIVERY,
    GATEWAY_CONFIRMATION_TIMEOUT_SECONDS: env.GATEWAY_CONFIRMATION_TIMEOUT_SECONDS,
    GATEWAY_MAIL_API_BASE_URL: env.GATEWAY_MAIL_API_BASE_URL,
    GATEWAY_CALENDAR_API_BASE_URL: env.GATEWAY_CALENDAR_API_BASE_URL,
    GATEWAY_BACKEND_TIMEOUT_MS: env.GATEWAY_BACKEND_TIMEOUT_MS,
    GATEWAY_SSE_KEEPALIVE_MS: env.GATEWAY_SSE_KEEPALIVE_MS,
    GATEWAY_SUBSCRIBER_BUFFER: env.GATEWAY_SUBSCRIBER_BUFFER,
  };
}
