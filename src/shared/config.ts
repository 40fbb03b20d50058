import { z } from "zod";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .optional()
  .transform((value) => value === "true" || value === "1");

const configSchema = z
  .object({
    MONGODB_URI: z.string().optional(),
    DB_NAME: z.string().default("sentinel"),
    STORAGE_TYPE: z.enum(["local", "supabase"]).default("local"),
    LOCAL_STORAGE_PATH: z.string().default("uploads"),
    LOCAL_STORAGE_URL: z.string().default("http://localhost:3000/files"),
    SUPABASE_URL: z.string().url().optional(),
    SUPABASE_ANON_KEY: z.string().optional(),
    SUPABASE_STORAGE_BUCKET: z.string().default("videos"),
    SUPABASE_S3_ACCESS_KEY_ID: z.string().optional(),
    SUPABASE_S3_SECRET_ACCESS_KEY: z.string().optional(),
    SUPABASE_S3_REGION: z.string().default("us-east-1"),
    MAX_VIDEO_SIZE_MB: z.coerce.number().positive().default(100),
    ALERT_SCORE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.8),
    GEMINI_API_KEY: z.string().optional(),
    GEMINI_MODEL: z.string().default("gemini-1.5-flash"),
    SCHEDULED_CLEANUP_ENABLED: booleanFlag,
    INGEST_FOLDER: z.string().optional(),
    INGEST_OWNER_ID: z.string().optional(),
    BREVO_API_KEY: z.string().optional(),
    BREVO_SENDER_EMAIL: z.string().email().optional(),
  })
  .superRefine((env, ctx) => {
    if (env.STORAGE_TYPE === "supabase") {
      for (const key of [
        "SUPABASE_URL",
        "SUPABASE_S3_ACCESS_KEY_ID",
        "SUPABASE_S3_SECRET_ACCESS_KEY",
      ] as const) {
        if (!env[key]) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [key],
            message: `${key} is required when STORAGE_TYPE=supabase`,
          });
        }
      }
    }
  });

export type AppConfig = z.infer<typeof configSchema>;

export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  const result = configSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }
  return result.data;
}

let cachedConfig: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = parseConfig(process.env);
  }
  return cachedConfig;
}
