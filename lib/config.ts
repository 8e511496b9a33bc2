import { z } from "zod";

const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

const envSchema = z.object({
  SUPABASE_URL: z.string().url().optional(),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1).optional(),
  SCRAPER_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  SCRAPER_USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT),
  MATCH_FUZZY_THRESHOLD: z.coerce.number().min(0).max(1).default(0.8),
  MATCH_WEIGHT_REQUIRED: z.coerce.number().min(0).max(1).default(0.6),
  MATCH_WEIGHT_PREFERRED: z.coerce.number().min(0).max(1).default(0.3),
  MATCH_WEIGHT_TECHNOLOGY: z.coerce.number().min(0).max(1).default(0.1),
});

export type AppConfig = {
  supabase: { url?: string; serviceRoleKey?: string };
  scraper: { timeoutMs: number; userAgent: string };
  matcher: {
    fuzzyThreshold: number;
    weights: { required: number; preferred: number; technology: number };
  };
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }
  const e = parsed.data;
  return {
    supabase: { url: e.SUPABASE_URL, serviceRoleKey: e.SUPABASE_SERVICE_ROLE_KEY },
    scraper: { timeoutMs: e.SCRAPER_TIMEOUT_MS, userAgent: e.SCRAPER_USER_AGENT },
    matcher: {
      fuzzyThreshold: e.MATCH_FUZZY_THRESHOLD,
      weights: {
        required: e.MATCH_WEIGHT_REQUIRED,
        preferred: e.MATCH_WEIGHT_PREFERRED,
        technology: e.MATCH_WEIGHT_TECHNOLOGY,
      },
    },
  };
}

let cached: AppConfig | undefined;

export function getConfig(): AppConfig {
  cached ??= loadConfig();
  return cached;
}
