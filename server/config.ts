import { config as loadDotenv } from "dotenv";
import { z } from "zod";
import { log } from "./log";

// Values already in the environment win over .env
loadDotenv();

const envSchema = z.object({
  // Any deployment label is accepted; only 'production' changes behaviour
  NODE_ENV: z.string().default('development'),
  PORT: z.coerce.number().int().positive().default(5000),
  DATABASE_URL: z.string().min(1).optional(),
  DB_POOL_MAX: z.coerce.number().int().positive().default(10),
});

export interface AppConfig {
  nodeEnv: string;
  port: number;
  databaseUrl: string | undefined;
  dbPoolMax: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    databaseUrl: parsed.DATABASE_URL,
    dbPoolMax: parsed.DB_POOL_MAX,
  };
}

// Environment validation - non-blocking, the server still answers health checks
export function validateEnvironment(config: AppConfig): boolean {
  if (!config.databaseUrl) {
    log(`⚠️ Warning: Missing environment variables: DATABASE_URL - database features disabled`);
    return false;
  }

  log('✅ Environment validation passed');
  return true;
}

export const config = loadConfig();
