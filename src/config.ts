import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

const BooleanFromEnv = z.preprocess((value) => {
  if (typeof value === "boolean") return value;
  if (typeof value === "number") return value !== 0;
  if (typeof value === "string") {
    const normalized = value.trim().toLowerCase();
    if (normalized === "true" || normalized === "1" || normalized === "yes" || normalized === "on") return true;
    if (normalized === "false" || normalized === "0" || normalized === "no" || normalized === "off") return false;
  }
  return value;
}, z.boolean());

const PackageJson = z.object({ version: z.string() });

function resolveDefaultVersion(): string {
  if (process.env.npm_package_version) {
    return process.env.npm_package_version;
  }
  try {
    const thisFile = fileURLToPath(import.meta.url);
    const packageJsonPath = path.resolve(path.dirname(thisFile), "../package.json");
    const parsed = PackageJson.safeParse(JSON.parse(fs.readFileSync(packageJsonPath, "utf8")));
    return parsed.success ? parsed.data.version : "dev";
  } catch {
    return "dev";
  }
}

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8080),
  BASE_URL: z.string().url().default("http://localhost:8080"),

  MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(20 * 1024 * 1024),
  // Base64 uploads are a third larger than the document they carry.
  HTTP_JSON_BODY_LIMIT_BYTES: z.coerce.number().int().positive().default(28 * 1024 * 1024),

  TRUST_PROXY: BooleanFromEnv.default(false),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(120),

  VERSION: z.string().default(resolveDefaultVersion())
});

export type AppConfig = z.infer<typeof EnvSchema>;

export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid environment: ${parsed.error.message}`);
  }

  if (parsed.data.HTTP_JSON_BODY_LIMIT_BYTES < parsed.data.MAX_UPLOAD_BYTES) {
    throw new Error("Invalid environment: HTTP_JSON_BODY_LIMIT_BYTES must be at least MAX_UPLOAD_BYTES");
  }

  return parsed.data;
}
