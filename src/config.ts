import { z } from "zod";

const booleanFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((v) => v === "true" || v === "1" || v === "yes");

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  NUTRI_DB_PATH: z.string().min(1).default("./data/nutri-diary.db"),
  NUTRI_SEED_DB_PATH: z.string().min(1).default("./assets/db/nutri-diary.db"),
  NUTRI_SCHEMA_PATH: z.string().min(1).default("./sql/schema.sql"),
  NUTRI_SECURE_STORE_PATH: z.string().min(1).default("./data/secure-store.json"),

  OFF_ENABLED: booleanFlag.default("true"),
  OFF_BASE_URL: z.string().url().default("https://world.openfoodfacts.org"),
  OFF_USER_AGENT: z.string().min(1).default("nutri-diary-mcp/1.0 (local diary)"),
  // OFF published limits: 100 req/min for products, 10 req/min for search
  OFF_RATE_PRODUCT_PER_MINUTE: positiveInt(100),
  OFF_RATE_SEARCH_PER_MINUTE: positiveInt(10),
  OFF_MAX_CONCURRENT: positiveInt(2),
  OFF_CACHE_TTL_DAYS: positiveInt(7),
  OFF_SEARCH_PAGE_SIZE: positiveInt(30),

  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export type LogLevel = z.infer<typeof EnvSchema>["LOG_LEVEL"];

export interface OffConfig {
  enabled: boolean;
  baseUrl: string;
  userAgent: string;
  productPerMinute: number;
  searchPerMinute: number;
  maxConcurrent: number;
  cacheTtlDays: number;
  searchPageSize: number;
}

export interface AppConfig {
  dbPath: string;
  seedDbPath: string;
  schemaPath: string;
  secureStorePath: string;
  off: OffConfig;
  logLevel: LogLevel;
}

// Reduced field list for OFF search responses
export const OFF_SEARCH_FIELDS =
  "code,product_name,brands,nutriscore_grade,nutriments,image_small_url,countries";

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const e = result.data;
  return {
    dbPath: e.NUTRI_DB_PATH,
    seedDbPath: e.NUTRI_SEED_DB_PATH,
    schemaPath: e.NUTRI_SCHEMA_PATH,
    secureStorePath: e.NUTRI_SECURE_STORE_PATH,
    off: {
      enabled: e.OFF_ENABLED,
      baseUrl: e.OFF_BASE_URL.replace(/\/+$/, ""),
      userAgent: e.OFF_USER_AGENT,
      productPerMinute: e.OFF_RATE_PRODUCT_PER_MINUTE,
      searchPerMinute: e.OFF_RATE_SEARCH_PER_MINUTE,
      maxConcurrent: e.OFF_MAX_CONCURRENT,
      cacheTtlDays: e.OFF_CACHE_TTL_DAYS,
      searchPageSize: e.OFF_SEARCH_PAGE_SIZE,
    },
    logLevel: e.LOG_LEVEL,
  };
}
