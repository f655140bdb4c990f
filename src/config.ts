import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { ParseConfigError } from "./core/errors.js";
import { DEFAULT_LIMIT, isSelectionFallback, type SelectionFallback } from "./core/query.js";
import { clampLimit, parseBooleanFlag } from "./core/request.js";
import { logger } from "./utils/logger.js";

export type TagsiftConfigFile = {
  catalog?: {
    path?: string;
  };
  select?: {
    limit?: number;
    fallback?: string;
    random?: boolean;
    reservedKeys?: string[];
  };
};

export type RuntimeConfig = {
  catalog: string;
  limit: number;
  fallback: SelectionFallback;
  random: boolean;
  reservedKeys: string[];
};

export type ResolveConfigOptions = {
  cli: {
    catalog?: string;
  };
  cwd: string;
  configPath?: string;
};

const DEFAULT_CONFIG_FILES = ["tagsift.toml", "tagsift.json"];
const DEFAULT_CATALOG = "catalog.json";
let loadedEnvPath: string | null = null;

// For testing - reset the loaded env path
export function resetConfigCache(): void {
  loadedEnvPath = null;
}

export function resolveRuntimeConfig(opts: ResolveConfigOptions): RuntimeConfig {
  loadDotEnvIfPresent(opts.cwd);
  const fileConfig = loadConfigFile(opts);

  const envCatalog = process.env.TAGSIFT_CATALOG;
  const envLimit = process.env.TAGSIFT_LIMIT;
  const envFallback = process.env.TAGSIFT_FALLBACK;
  const envRandom = process.env.TAGSIFT_RANDOM;

  const catalog = expandEnvVars(opts.cli.catalog ?? envCatalog ?? fileConfig?.catalog?.path ?? DEFAULT_CATALOG);

  // an empty TAGSIFT_LIMIT counts as unset
  const envLimitText = envLimit !== undefined ? expandEnvVars(envLimit).trim() : "";
  const rawLimit = (envLimitText ? Number(envLimitText) : undefined)
    ?? fileConfig?.select?.limit ?? DEFAULT_LIMIT;
  if (!Number.isFinite(rawLimit)) {
    throw new ParseConfigError(`Invalid limit: ${envLimitText || String(rawLimit)}`);
  }

  const rawFallback = expandEnvVars(envFallback ?? fileConfig?.select?.fallback ?? "none")
    .trim()
    .toLowerCase();
  if (!isSelectionFallback(rawFallback)) {
    throw new ParseConfigError(`Invalid fallback mode: ${rawFallback} (expected none, soft, aggressive or force)`);
  }

  const random = (envRandom !== undefined ? parseBooleanFlag(expandEnvVars(envRandom), false) : undefined)
    ?? fileConfig?.select?.random
    ?? false;

  return {
    catalog: resolve(opts.cwd, catalog),
    limit: clampLimit(rawLimit),
    fallback: rawFallback,
    random,
    reservedKeys: fileConfig?.select?.reservedKeys ?? []
  };
}

function loadConfigFile(opts: ResolveConfigOptions): TagsiftConfigFile | undefined {
  const candidates = resolveConfigPaths(opts);
  for (const filePath of candidates) {
    if (!existsSync(filePath)) continue;
    const raw = readFileSync(filePath, "utf8");
    if (filePath.endsWith(".json")) {
      return parseJsonConfig(raw, filePath);
    }
    if (filePath.endsWith(".toml")) {
      return parseTomlConfig(raw, filePath);
    }
  }
  if (opts.configPath) {
    throw new ParseConfigError(`Config file not found: ${resolve(opts.cwd, opts.configPath)}`);
  }
  return undefined;
}

function resolveConfigPaths(opts: ResolveConfigOptions): string[] {
  if (opts.configPath) {
    return [resolve(opts.cwd, opts.configPath)];
  }
  return DEFAULT_CONFIG_FILES.map((name) => resolve(opts.cwd, name));
}

function parseJsonConfig(raw: string, filePath: string): TagsiftConfigFile {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new ParseConfigError(`Failed to parse ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
  }
  return normaliseConfigShape(data, filePath);
}

function parseTomlConfig(raw: string, filePath: string): TagsiftConfigFile {
  const config: Record<string, Record<string, unknown>> = {};
  let currentSection: "catalog" | "select" | undefined;
  const lines = raw.split(/\r?\n/);

  for (const originalLine of lines) {
    const line = originalLine.trim();
    if (!line || line.startsWith("#") || line.startsWith(";")) continue;
    const sectionMatch = line.match(/^\[(.+)]$/);
    if (sectionMatch) {
      const section = sectionMatch[1];
      currentSection = section === "catalog" || section === "select" ? section : undefined;
      if (currentSection && !config[currentSection]) {
        config[currentSection] = {};
      }
      continue;
    }

    const kvMatch = line.match(/^([A-Za-z_][A-Za-z0-9_]*)\s*=\s*(.+)$/);
    if (!kvMatch) {
      throw new ParseConfigError(`Invalid TOML line in ${filePath}: ${originalLine}`);
    }
    const key = kvMatch[1];
    const valueLiteral = kvMatch[2];
    if (!key || valueLiteral === undefined) {
      throw new ParseConfigError(`Invalid TOML assignment in ${filePath}: ${originalLine}`);
    }
    if (!currentSection) {
      continue;
    }
    const section = config[currentSection];
    if (section) section[key] = parseTomlValue(valueLiteral);
  }

  return normaliseConfigShape(config, filePath);
}

function parseTomlValue(literal: string): unknown {
  const trimmed = literal.trim();
  if (trimmed.startsWith("[") && trimmed.endsWith("]")) {
    const inner = trimmed.slice(1, -1).trim();
    if (!inner) return [];
    return inner.split(",").map(part => parseTomlValue(part));
  }
  if ((trimmed.startsWith("\"") && trimmed.endsWith("\"")) || (trimmed.startsWith("'") && trimmed.endsWith("'"))) {
    return trimmed.slice(1, -1);
  }
  if (trimmed === "true") return true;
  if (trimmed === "false") return false;
  const number = Number(trimmed);
  if (!Number.isNaN(number)) return number;
  return trimmed;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function normaliseConfigShape(input: unknown, filePath: string): TagsiftConfigFile {
  if (!isRecord(input)) {
    throw new ParseConfigError(`Config at ${filePath} must be an object`);
  }
  const out: TagsiftConfigFile = {};
  const catalog = input.catalog;
  if (isRecord(catalog)) {
    out.catalog = {};
    if (typeof catalog.path === "string") out.catalog.path = catalog.path;
  }
  const select = input.select;
  if (isRecord(select)) {
    out.select = {};
    if (typeof select.limit === "number") out.select.limit = select.limit;
    if (typeof select.fallback === "string") out.select.fallback = select.fallback;
    if (typeof select.random === "boolean") out.select.random = select.random;
    const reserved = select.reserved_keys ?? select.reservedKeys;
    if (Array.isArray(reserved)) {
      out.select.reservedKeys = reserved.filter((key): key is string => typeof key === "string");
    }
  }
  return out;
}

function loadDotEnvIfPresent(cwd: string): void {
  const envPath = resolve(cwd, ".env");
  if (loadedEnvPath === envPath) return;
  if (!existsSync(envPath)) {
    loadedEnvPath = envPath;
    return;
  }
  loadedEnvPath = envPath;
  const raw = readFileSync(envPath, "utf8");
  const lines = raw.split(/\r?\n/);
  for (const originalLine of lines) {
    const line = originalLine.trim();
    if (!line || line.startsWith("#")) continue;
    const match = line.match(/^([A-Za-z_][A-Za-z0-9_]*)=(.*)$/);
    if (!match) continue;
    const key = match[1] ?? "";
    const value = match[2] ?? "";
    if (!key) continue;
    if (process.env[key] !== undefined) continue;
    process.env[key] = stripQuotes(value);
  }
}

function stripQuotes(value: string): string {
  const trimmed = value.trim();
  if ((trimmed.startsWith("\"") && trimmed.endsWith("\"")) || (trimmed.startsWith("'") && trimmed.endsWith("'"))) {
    return trimmed.slice(1, -1);
  }
  return trimmed;
}

function expandEnvVars(value: string): string {
  // Support ${VAR_NAME} and $VAR_NAME syntax
  return value.replace(/\$\{([^}]+)\}|\$([A-Za-z_][A-Za-z0-9_]*)/g, (match: string, braced?: string, bare?: string) => {
    const varName = braced ?? bare ?? "";
    const envValue = process.env[varName];
    if (envValue === undefined) {
      logger.warn(`Environment variable ${varName} is not defined`);
      return match;
    }
    return envValue;
  });
}
