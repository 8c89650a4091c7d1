import type { ConfigValue, RawConfigMap } from "../shared/types.js";
import { readTextFileSync } from "../utils/fs.js";

const COMMENT_MARKERS = [";", "#"] as const;
const INTEGER_PATTERN = /^[-+]?\d+$/;
const FLOAT_PATTERN = /^[-+]?\d*\.\d+$/;
const INTEGER_TEXT_PATTERN = /^\s*[-+]?\d+\s*$/;

/**
 * Parses the line-oriented `key=value` format. Lines without `=` and
 * comment-only lines are skipped; a repeated key keeps its last value.
 */
export function parseLegacyConfig(text: string): RawConfigMap {
  const config: RawConfigMap = new Map();

  for (const raw of text.split(/\r\n|\n|\r/)) {
    const line = stripComment(raw);
    if (!line) {
      continue;
    }

    const separator = line.indexOf("=");
    if (separator === -1) {
      continue;
    }

    const key = line.slice(0, separator).trim();
    config.set(key, parseValue(line.slice(separator + 1)));
  }

  return config;
}

export function readLegacyConfigFile(filePath: string): RawConfigMap {
  return parseLegacyConfig(readTextFileSync(filePath));
}

/**
 * A `;` or `#` starts a comment only at column 0 or right after whitespace,
 * so `val=a;b` keeps its semicolon.
 */
export function stripComment(line: string): string {
  let result = line;
  for (const marker of COMMENT_MARKERS) {
    const index = findCommentStart(result, marker);
    if (index !== -1) {
      result = result.slice(0, index);
    }
  }
  return result.trim();
}

function findCommentStart(line: string, marker: string): number {
  let index = line.indexOf(marker);
  while (index !== -1) {
    if (index === 0 || /\s/.test(line.charAt(index - 1))) {
      return index;
    }
    index = line.indexOf(marker, index + 1);
  }
  return -1;
}

export function parseValue(raw: string): ConfigValue {
  const text = raw.trim();
  if (!text) {
    return { kind: "string", value: "" };
  }

  if (text.includes('"')) {
    const items = text.split(",").map((item) => unquote(item.trim()));
    if (items.length === 1) {
      return { kind: "string", value: items[0] ?? "" };
    }
    return { kind: "list", value: items };
  }

  if (INTEGER_PATTERN.test(text)) {
    return parseInteger(text);
  }

  if (FLOAT_PATTERN.test(text)) {
    return { kind: "float", value: Number.parseFloat(text) };
  }

  // 0/1 double as booleans in the legacy format and stay integers
  if (text === "0" || text === "1") {
    return parseInteger(text);
  }

  return { kind: "string", value: text };
}

function parseInteger(text: string): ConfigValue {
  const negative = text.startsWith("-");
  const digits = text.replace(/^[-+]/, "").replace(/^0+/, "") || "0";
  return {
    kind: "integer",
    value: Number.parseInt(text, 10),
    text: negative && digits !== "0" ? `-${digits}` : digits
  };
}

function unquote(item: string): string {
  if (item.length >= 2 && item.startsWith('"') && item.endsWith('"')) {
    return item.slice(1, -1);
  }
  return item.replace(/^"+|"+$/g, "").replace(/^'+|'+$/g, "");
}

/**
 * Text form used in placeholders and paths. Integers use their exact text.
 * Floats print positionally with at least one fractional digit when the
 * decimal exponent is in [-4, 16), and as `1e-05` / `1.5e+16` otherwise.
 */
export function formatConfigValue(value: ConfigValue): string {
  switch (value.kind) {
    case "string":
      return value.value;
    case "integer":
      return value.text;
    case "float":
      return formatFloat(value.value);
    case "list":
      return value.value.join(",");
    default: {
      const _exhaustive: never = value;
      return _exhaustive;
    }
  }
}

function formatFloat(value: number): string {
  if (!Number.isFinite(value)) {
    return value > 0 ? "inf" : "-inf";
  }
  if (Object.is(value, -0)) {
    return "-0.0";
  }

  const [mantissa = "0", exponentText = "0"] = value.toExponential().split("e");
  const exponent = Number.parseInt(exponentText, 10);
  if (exponent >= -4 && exponent < 16) {
    const positional = String(value);
    return positional.includes(".") ? positional : `${positional}.0`;
  }

  const sign = exponent < 0 ? "-" : "+";
  return `${mantissa}e${sign}${Math.abs(exponent).toString().padStart(2, "0")}`;
}

/** Empty strings and numeric zero count as unset, as in the legacy recorder. */
export function isBlankValue(value: ConfigValue | undefined): boolean {
  if (!value) {
    return true;
  }

  switch (value.kind) {
    case "string":
      return value.value === "";
    case "integer":
    case "float":
      return value.value === 0;
    case "list":
      return value.value.length === 0;
    default: {
      const _exhaustive: never = value;
      return _exhaustive;
    }
  }
}

/**
 * Integers pass through, floats truncate, strings must be digits with an
 * optional sign. Values too large to be a finite number are rejected.
 */
export function coerceInteger(value: ConfigValue): number | undefined {
  switch (value.kind) {
    case "integer":
      return Number.isFinite(value.value) ? value.value : undefined;
    case "float":
      return Number.isFinite(value.value) ? Math.trunc(value.value) : undefined;
    case "string":
      return INTEGER_TEXT_PATTERN.test(value.value) ? Number.parseInt(value.value.trim(), 10) : undefined;
    case "list":
      return undefined;
    default: {
      const _exhaustive: never = value;
      return _exhaustive;
    }
  }
}

export function toStringList(value: ConfigValue): string[] {
  return value.kind === "list" ? [...value.value] : [formatConfigValue(value)];
}
