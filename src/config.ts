import os from "os";
import path from "path";

export const DEFAULT_BASE_URL = "https://tahvel.edu.ee/hois_back";
export const DEFAULT_PAGE_SIZE = 50;
export const DEFAULT_LANG = "ET";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export interface AppConfig {
  baseUrl: string;
  configDir: string;
  pageSize: number;
  lang: string;
}

/**
 * Build the configuration from environment variables.
 * The CLI loads .env (via dotenv) before calling this.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const baseUrl = (env.TAHVEL_BASE_URL?.trim() || DEFAULT_BASE_URL).replace(/\/+$/, "");
  const configDir = env.TAHVEL_CONFIG_DIR?.trim() || path.join(os.homedir(), ".tahvel-checker");
  const lang = env.TAHVEL_LANG?.trim() || DEFAULT_LANG;

  let pageSize = DEFAULT_PAGE_SIZE;
  const rawPageSize = env.TAHVEL_PAGE_SIZE?.trim();
  if (rawPageSize) {
    pageSize = Number(rawPageSize);
    if (!Number.isInteger(pageSize) || pageSize <= 0) {
      throw new ConfigError(`TAHVEL_PAGE_SIZE must be a positive integer, got "${rawPageSize}"`);
    }
  }

  return { baseUrl, configDir, pageSize, lang };
}
