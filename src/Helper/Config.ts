import { z } from "zod";
import { BotError } from "./Errors";

export const DEFAULT_ADMIN_CONTACT =
  "📩 To reach the administrator, send /contact_admin and then your message.";

const integer = (fallback: number, min: number) =>
  z.coerce.number().int().min(min).default(fallback);

const envSchema = z
  .object({
    TELEGRAM_BOT_TOKEN: z.string({ required_error: "is required" }).trim().min(1, "is required"),
    OPENROUTER_API_KEY: z.string({ required_error: "is required" }).trim().min(1, "is required"),
    OPENROUTER_MODEL: z.string().trim().min(1).default("openai/o4-mini"),
    OPENROUTER_BASE_URL: z.string().url().default("https://openrouter.ai/api/v1"),
    OPENROUTER_TIMEOUT_MS: integer(30_000, 1),
    OPENROUTER_MAX_PROMPT_CHARS: integer(4000, 1),
    OPENROUTER_SITE_URL: z.string().url().optional(),
    OPENROUTER_APP_NAME: z.string().optional(),
    ADMIN_CONTACT: z.string().trim().min(1, "must not be blank when set").optional(),
    ADMIN_CHAT_ID: z.coerce.number().int().optional(),
    MAX_PENDING_IMAGES: integer(50, 1),
    SESSION_TTL_MINUTES: integer(30, 1),
    WEBHOOK_URL: z.string().url().optional(),
    PORT: z.coerce.number().int().min(1).max(65535).optional(),
  })
  .superRefine((env, ctx) => {
    if (env.WEBHOOK_URL && env.PORT === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["PORT"],
        message: "is required when WEBHOOK_URL is set",
      });
    }
  });

export interface AppConfig {
  telegramToken: string;
  openRouter: {
    apiKey: string;
    model: string;
    baseURL: string;
    timeoutMs: number;
    maxPromptChars: number;
    siteUrl?: string;
    appName?: string;
  };
  adminContact: string;
  adminChatId?: number;
  maxPendingImages: number;
  sessionTtlMs: number;
  webhook?: { url: string; port: number };
}

type Env = Record<string, string | undefined>;

// Empty variables count as unset, so `KEY=` in .env behaves like a missing
// line. ADMIN_CONTACT is kept as given: a blank contact is a mistake.
function withoutEmpty(env: Env): Env {
  const result: Env = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && (value !== "" || key === "ADMIN_CONTACT")) {
      result[key] = value;
    }
  }
  return result;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const parsed = envSchema.safeParse(withoutEmpty(env));

  if (!parsed.success) {
    const problems = parsed.error.issues.map(
      (issue) => `${issue.path.join(".")} ${issue.message}`
    );
    throw new BotError("MissingConfiguration", problems.join("; "));
  }

  const data = parsed.data;

  return {
    telegramToken: data.TELEGRAM_BOT_TOKEN,
    openRouter: {
      apiKey: data.OPENROUTER_API_KEY,
      model: data.OPENROUTER_MODEL,
      baseURL: data.OPENROUTER_BASE_URL,
      timeoutMs: data.OPENROUTER_TIMEOUT_MS,
      maxPromptChars: data.OPENROUTER_MAX_PROMPT_CHARS,
      siteUrl: data.OPENROUTER_SITE_URL,
      appName: data.OPENROUTER_APP_NAME,
    },
    adminContact: data.ADMIN_CONTACT ?? DEFAULT_ADMIN_CONTACT,
    adminChatId: data.ADMIN_CHAT_ID,
    maxPendingImages: data.MAX_PENDING_IMAGES,
    sessionTtlMs: data.SESSION_TTL_MINUTES * 60_000,
    webhook:
      data.WEBHOOK_URL && data.PORT !== undefined
        ? { url: data.WEBHOOK_URL, port: data.PORT }
        : undefined,
  };
}
