import { readFileSync, writeFileSync } from "node:fs";
import { MissingFileError, QueryPayloadError } from "./errors.js";

export type ConfigFormat = "toml" | "json";

const TOML_TEMPLATE = `# tagsift configuration file

[catalog]
# JSON snapshot of the media catalogue, relative to the working directory.
# Supports environment variable substitution: path = "\${CATALOG_DIR}/catalog.json"
path = "catalog.json"

[select]
# Maximum number of items returned (1-100)
limit = 10

# What to do when nothing matches strictly: none, soft, aggressive or force
fallback = "none"

# Shuffle strict matches instead of ranking them by recency
random = false

# Extra query-string keys that are never treated as tag filters
# reserved_keys = ["room", "speaker"]
`;

const JSON_TEMPLATE = {
  catalog: {
    path: "catalog.json"
  },
  select: {
    limit: 10,
    fallback: "none",
    random: false,
    reserved_keys: []
  }
};

export function writeDefaultConfig(filePath: string, format: ConfigFormat = "toml"): void {
  const content = format === "toml"
    ? TOML_TEMPLATE
    : `${JSON.stringify(JSON_TEMPLATE, null, 2)}\n`;

  writeFileSync(filePath, content, { encoding: "utf8", flag: "wx" });
}

/**
 * Read a structured query payload from disk. Shape validation happens later,
 * in parseQueryPayload.
 */
export function readJsonPayload(filePath: string): unknown {
  let raw: string;
  try {
    raw = readFileSync(filePath, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      throw new MissingFileError(filePath, "query payload");
    }
    throw error;
  }
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new QueryPayloadError([`${filePath}: ${error instanceof Error ? error.message : String(error)}`]);
  }
}
