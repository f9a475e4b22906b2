import fs from "node:fs";
import JSON5 from "json5";
import { ModuleParamsSchema, type ModuleParams } from "./schema.js";
import { ConfigurationError } from "../util/errors.js";

export type RawParams = Record<string, unknown>;

const NODE_ID_ALIASES = ["node_ids", "server_ids", "server_id", "node_id"];
const LIST_KEYS = new Set(NODE_ID_ALIASES);
const BOOL_KEYS = new Set(["verify_ssl_cert"]);

const TRUE_WORDS = new Set(["yes", "true", "on", "1", "y"]);
const FALSE_WORDS = new Set(["no", "false", "off", "0", "n"]);

/**
 * Parse `key=value` words into a raw parameter map. The first `=` splits,
 * so values may themselves contain `=`.
 */
export function parseKeyValueArgs(words: string[]): RawParams {
  const out: RawParams = {};
  for (const word of words) {
    const idx = word.indexOf("=");
    if (idx <= 0) throw new ConfigurationError(`Expected key=value, got "${word}"`);
    const key = word.slice(0, idx).trim();
    out[key] = word.slice(idx + 1).trim();
  }
  return out;
}

export function loadParamsFile(filePath: string): RawParams {
  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new ConfigurationError(`Cannot read params file ${filePath}: ${err instanceof Error ? err.message : err}`);
  }
  let parsed: unknown;
  try {
    parsed = JSON5.parse(text);
  } catch (err) {
    throw new ConfigurationError(`Invalid params file ${filePath}: ${err instanceof Error ? err.message : err}`);
  }
  if (!isRecord(parsed)) throw new ConfigurationError(`Params file ${filePath} must contain an object`);
  return parsed;
}

function isRecord(value: unknown): value is RawParams {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toList(value: unknown): unknown {
  if (typeof value === "string") return value.split(",").map((s) => s.trim()).filter(Boolean);
  return value;
}

function toBool(value: unknown): unknown {
  if (typeof value !== "string") return value;
  const word = value.trim().toLowerCase();
  if (TRUE_WORDS.has(word)) return true;
  if (FALSE_WORDS.has(word)) return false;
  return value;
}

/** Fold aliases into `node_ids` and coerce string forms of lists and booleans. */
export function normalizeParams(raw: RawParams): RawParams {
  const out: RawParams = {};
  for (const [key, value] of Object.entries(raw)) {
    if (value === undefined || value === null) continue;
    if (LIST_KEYS.has(key)) continue;
    out[key] = BOOL_KEYS.has(key) ? toBool(value) : value;
  }
  const aliases = NODE_ID_ALIASES.filter((key) => raw[key] !== undefined && raw[key] !== null);
  if (aliases.length > 1) {
    throw new ConfigurationError(`Parameters are aliases of each other, set only one: ${aliases.join(", ")}`);
  }
  if (aliases.length === 1) out.node_ids = toList(raw[aliases[0]]);
  return out;
}

/**
 * Merge raw parameter sources (later wins), normalize and validate them.
 * Every issue is reported at once as a ConfigurationError.
 */
export function parseModuleParams(...sources: RawParams[]): ModuleParams {
  const merged: RawParams = {};
  for (const source of sources) {
    const normalized = normalizeParams(source);
    // A later node id source replaces an earlier one under any alias
    Object.assign(merged, normalized);
  }
  const result = ModuleParamsSchema.safeParse(merged);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "params"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid parameters: ${details}`);
  }
  return result.data;
}
