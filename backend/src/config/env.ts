import { z } from "zod";
import fs from "node:fs";
import path from "node:path";

function loadDotEnvFileIfPresent(filename = ".env") {
  try {
    const p = path.resolve(process.cwd(), filename);
    if (!fs.existsSync(p)) return;

    const raw = fs.readFileSync(p, "utf8");
    for (const line of raw.split(/\r?\n/)) {
      const trimmed = line.trim();
      if (!trimmed || trimmed.startsWith("#")) continue;

      const idx = trimmed.indexOf("=");
      if (idx === -1) continue;

      const key = trimmed.slice(0, idx).trim();
      let val = trimmed.slice(idx + 1).trim();

      // strip surrounding quotes
      if (
        (val.startsWith('"') && val.endsWith('"')) ||
        (val.startsWith("'") && val.endsWith("'"))
      ) {
        val = val.slice(1, -1);
      }

      // real env wins
      if (process.env[key] === undefined) process.env[key] = val;
    }
  } catch (e) {
    console.warn("[env] failed to load .env:", e);
  }
}

const EnvSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),

  PORT: z.coerce.number().int().min(1).max(65535).default(8000),

  // Which pretrained image-classification model to use, e.g. "google/vit-base-patch16-224"
  HF_MODEL_ID: z.string().trim().min(1),

  HF_TOKEN: z.string().trim().min(1).optional(),

  // 0 = wait as long as the model takes
  INFERENCE_TIMEOUT_MS: z.coerce.number().int().min(0).default(0),

  MAX_UPLOAD_BYTES: z.coerce.number().int().min(1).default(10_000_000),
});

export type AppEnv = z.infer<typeof EnvSchema>;

export function parseEnv(processEnv: NodeJS.ProcessEnv): AppEnv {
  const parsed = EnvSchema.safeParse(processEnv);
  if (!parsed.success) {
    // Fail fast: no hidden fallbacks
    const keys = Object.keys(parsed.error.flatten().fieldErrors).join(", ");
    throw new Error(`Invalid environment variables: ${keys}`);
  }
  return parsed.data;
}

export function loadEnv(processEnv: NodeJS.ProcessEnv = process.env): AppEnv {
  loadDotEnvFileIfPresent(".env");
  return parseEnv(processEnv);
}
