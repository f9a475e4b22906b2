import fs from "node:fs";
import JSON5 from "json5";
import { CcBackupConfigSchema, DEFAULT_CONFIG, type CcBackupConfig } from "./schema.js";
import { resolveConfigFilePath } from "./paths.js";
import { ConfigurationError } from "../util/errors.js";
import { log } from "../util/logger.js";

export interface Credentials {
  userId: string;
  password: string;
}

function mergeEnvVars(config: CcBackupConfig): CcBackupConfig {
  const envRegion = process.env.CCBACKUP_REGION?.trim();
  if (envRegion) config.region = envRegion;
  const envHost = process.env.CCBACKUP_API_HOST?.trim();
  if (envHost) config.apiHost = envHost;
  return config;
}

export function loadConfig(overridePath?: string): CcBackupConfig {
  const configPath = overridePath || resolveConfigFilePath();

  let raw: unknown = {};
  if (fs.existsSync(configPath)) {
    try {
      const parsed: unknown = JSON5.parse(fs.readFileSync(configPath, "utf-8"));
      if (parsed && typeof parsed === "object" && !Array.isArray(parsed)) {
        raw = parsed;
      } else {
        log.warn(`Config at ${configPath} is not an object, ignoring it`);
      }
    } catch (err) {
      log.warn(`Failed to parse config at ${configPath}: ${err}`);
    }
  } else if (overridePath) {
    throw new ConfigurationError(`Config file not found: ${overridePath}`);
  }

  const result = CcBackupConfigSchema.safeParse(raw);
  if (!result.success) {
    log.warn(`Config validation issues: ${result.error.message}`);
    return mergeEnvVars({ ...DEFAULT_CONFIG });
  }
  return mergeEnvVars({ ...DEFAULT_CONFIG, ...result.data });
}

// DIDATA_USER / DIDATA_PASSWORD take precedence over the config file
export function resolveCredentials(config: CcBackupConfig): Credentials {
  const userId = process.env.DIDATA_USER?.trim() || config.credentials?.userId;
  const password = process.env.DIDATA_PASSWORD?.trim() || config.credentials?.password;
  if (!userId || !password) throw new ConfigurationError("User credentials not found");
  return { userId, password };
}
