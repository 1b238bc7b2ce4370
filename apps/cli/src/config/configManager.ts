import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import YAML, { YAMLParseError } from "yaml";
import { ZodError } from "zod";
import { AppConfigSchema, type AppConfig, type ProviderName } from "./schema";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const HERE = path.dirname(fileURLToPath(import.meta.url));
const REPO_ROOT = path.resolve(HERE, "..", "..", "..", "..");

export const DEFAULT_CONFIG_PATH = "config/default.yaml";

const API_KEY_ENV: Record<ProviderName, string> = {
  alphaVantage: "ALPHA_VANTAGE_API_KEY",
  fred: "FRED_API_KEY",
};
const PROVIDERS: readonly ProviderName[] = ["alphaVantage", "fred"];

function deepFreeze<T extends object>(obj: T): T {
  Object.freeze(obj);
  for (const val of Object.values(obj)) {
    if (val && typeof val === "object" && !Object.isFrozen(val)) {
      deepFreeze(val);
    }
  }
  return obj;
}

export function resolveConfigPath(preferred: string): string {
  const candidates = [
    preferred,
    path.resolve(process.cwd(), preferred),
    path.join(REPO_ROOT, preferred),
    path.join(REPO_ROOT, DEFAULT_CONFIG_PATH),
  ];

  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) {
      return candidate;
    }
  }

  throw new ConfigError(
    `Unable to locate configuration file. Tried: ${candidates.join(", ")}`
  );
}

/** Parses and validates a config document, applying API-key overrides from env. */
export function parseConfig(raw: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  let cfg: AppConfig;
  try {
    cfg = AppConfigSchema.parse(YAML.parse(raw));
  } catch (err) {
    if (err instanceof YAMLParseError) {
      throw new ConfigError(`Malformed configuration: ${err.message}`);
    }
    if (err instanceof ZodError) {
      const issues = err.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
      throw new ConfigError(`Invalid configuration: ${issues}`);
    }
    throw err;
  }

  for (const provider of PROVIDERS) {
    const override = env[API_KEY_ENV[provider]];
    if (override) {
      cfg.providers[provider].apiKey = override;
    }
  }
  return deepFreeze(cfg);
}

export function loadConfig(configPath = DEFAULT_CONFIG_PATH, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const resolved = resolveConfigPath(configPath);
  return parseConfig(fs.readFileSync(resolved, "utf-8"), env);
}

export function getApiKey(cfg: AppConfig, provider: ProviderName): string {
  const key = cfg.providers[provider].apiKey;
  if (!key) {
    throw new ConfigError(`API key not found for service: ${provider} (set ${API_KEY_ENV[provider]})`);
  }
  return key;
}
