import fs from "fs-extra";
import { parse as parseYaml, YAMLParseError } from "yaml";

export const DEFAULT_CONFIG_PATH = "config.yaml";
export const DEFAULT_MIN_EXPIRY_DAYS = 30;
export const DEFAULT_CONCURRENCY = 1;

export interface CheckerConfig {
  domains: string[];
  minExpiryDays: number;
  healthcheckEnabled: boolean;
  concurrency: number;
}

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly configPath?: string,
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

// A domain must be usable as the host (and optional port) of an https URL.
export const isValidHost = (domain: string) => {
  try {
    return new URL(`https://${domain}/`).host === domain;
  } catch {
    return false;
  }
};

export function resolveConfigPath(positional: string | undefined, env: NodeJS.ProcessEnv = process.env): string {
  const fromArgs = positional?.trim();
  if (fromArgs) return fromArgs;
  const fromEnv = env.SECURITY_TXT_CONFIG?.trim();
  return fromEnv || DEFAULT_CONFIG_PATH;
}

/**
 * Turns the raw YAML document into a checked configuration. Keys the checker
 * does not know about are ignored.
 */
export function parseConfig(raw: unknown, configPath?: string): CheckerConfig {
  if (!isRecord(raw)) {
    throw new ConfigError("config must be a mapping", configPath);
  }

  const { domains, min_expiry_days, healthcheck_enabled, concurrency } = raw;

  if (!Array.isArray(domains) || domains.length === 0) {
    throw new ConfigError("no domains configured", configPath);
  }

  const normalizedDomains = domains.map((domain: unknown, index) => {
    const normalized = typeof domain === "string" ? domain.trim().toLowerCase() : "";
    if (!normalized || !isValidHost(normalized)) {
      throw new ConfigError(`invalid domain at index ${index}`, configPath);
    }
    return normalized;
  });

  const readInteger = (value: unknown, fallback: number, min: number, message: string): number => {
    if (value === undefined) return fallback;
    if (typeof value !== "number" || !Number.isInteger(value) || value < min) {
      throw new ConfigError(message, configPath);
    }
    return value;
  };

  if (healthcheck_enabled !== undefined && typeof healthcheck_enabled !== "boolean") {
    throw new ConfigError("invalid healthcheck_enabled", configPath);
  }

  return {
    domains: normalizedDomains,
    minExpiryDays: readInteger(min_expiry_days, DEFAULT_MIN_EXPIRY_DAYS, 0, "invalid min_expiry_days"),
    healthcheckEnabled: healthcheck_enabled === true,
    concurrency: readInteger(concurrency, DEFAULT_CONCURRENCY, 1, "invalid concurrency"),
  };
}

export async function loadConfig(configPath = DEFAULT_CONFIG_PATH): Promise<CheckerConfig> {
  if (!(await fs.pathExists(configPath))) {
    throw new ConfigError("file not found", configPath);
  }

  let text: string;
  try {
    text = await fs.readFile(configPath, "utf8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`unable to read file: ${reason}`, configPath);
  }

  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (error) {
    if (error instanceof YAMLParseError) {
      throw new ConfigError(`invalid YAML: ${error.message}`, configPath);
    }
    throw error;
  }

  return parseConfig(raw, configPath);
}
