import path from "path";
import { config as loadDotenv } from "dotenv";
import type { IntentAuditConfig } from "./services/IntentAuditService";

const DEFAULT_ENV_PATH = path.resolve(__dirname, "..", "..", ".env");
const DEFAULT_AUDIT_PATH = path.resolve(process.cwd(), "logs", "intent-audit.sqlite");

export type ServerConfig = {
  port: number;
  useHttps: boolean;
  sslCertPath?: string;
  sslKeyPath?: string;
  tickMs: number;
  disengageSeconds: number;
  sweepIntervalMs: number;
  engagementOnTargeted: boolean;
  attackIntervalTicks: number;
  jwtSecret: string;
  staticAssetsPath?: string;
  intentAudit: IntentAuditConfig;
};

export function parseNumber(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  return value.toLowerCase() === "true" || value === "1";
}

/**
 * Loads `.env` into `process.env`. Existing variables win.
 */
export function loadEnvFile(envPath = process.env.ENV_PATH ?? DEFAULT_ENV_PATH): void {
  const result = loadDotenv({ path: envPath });
  if (result.error) {
    console.log(`[config] No env file at ${envPath}, using process environment only`);
  }
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    port: parseNumber(env.PORT, 8888),
    useHttps: parseBoolean(env.USE_HTTPS, false),
    sslCertPath: env.SSL_CERT_PATH || undefined,
    sslKeyPath: env.SSL_KEY_PATH || undefined,
    tickMs: Math.max(1, parseNumber(env.TICK_MS, 600)),
    disengageSeconds: Math.max(0, parseNumber(env.DISENGAGE_SECONDS, 10)),
    sweepIntervalMs: Math.max(1, parseNumber(env.SWEEP_INTERVAL_MS, 1000)),
    engagementOnTargeted: parseBoolean(env.ENGAGEMENT_ON_TARGETED, false),
    attackIntervalTicks: Math.max(1, Math.floor(parseNumber(env.ATTACK_INTERVAL_TICKS, 4))),
    jwtSecret: env.JWT_SECRET || "dev-secret-change-me",
    staticAssetsPath: env.STATIC_ASSETS_PATH || undefined,
    intentAudit: {
      enabled: parseBoolean(env.INTENT_AUDIT_ENABLED, false),
      dbPath: env.INTENT_AUDIT_PATH || DEFAULT_AUDIT_PATH,
      batchSize: Math.max(1, parseNumber(env.INTENT_AUDIT_BATCH_SIZE, 200)),
      flushMs: Math.max(1, parseNumber(env.INTENT_AUDIT_FLUSH_MS, 2000)),
      dedupWindowMs: Math.max(0, parseNumber(env.INTENT_AUDIT_DEDUP_WINDOW_MS, 60000))
    }
  };
}

/**
 * Number of ticks between engagement sweeps; never less than one.
 */
export function sweepIntervalTicks(config: Pick<ServerConfig, "tickMs" | "sweepIntervalMs">): number {
  return Math.max(1, Math.round(config.sweepIntervalMs / config.tickMs));
}
