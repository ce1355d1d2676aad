import "dotenv/config";
import { IANAZone } from "luxon";
import { z } from "zod";

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().default(3005),
  CODES_JSON_PATH: z.string().default("data/codes.json"),
  CIVIL_TIMEZONE: z
    .string()
    .default("America/Chicago")
    .refine((zone) => IANAZone.isValidZone(zone), "must be a valid IANA time zone"),
  /** Bearer token for /api/admin/*; admin routes are disabled when unset */
  ADMIN_TOKEN: optionalString,
  SWEEP_INTERVAL_MINUTES: z.coerce.number().min(0).default(0),
  GITHUB_USER: optionalString,
  GITHUB_REPO: optionalString,
  GITHUB_TOKEN: optionalString,
  GITHUB_BRANCH: optionalString,
  GITHUB_API_URL: z.string().url().default("https://api.github.com"),
  /** Comma-separated list of origins allowed to call the admin API */
  TRUSTED_ORIGINS: z.string().optional(),
});

export type Env = z.infer<typeof envSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const messages = parsed.error.issues
      .map((e) => `  - ${e.path.join(".")}: ${e.message}`)
      .join("\n");
    throw new Error(`Environment validation failed:\n${messages}`);
  }
  return parsed.data;
}

export const env = loadEnv();
