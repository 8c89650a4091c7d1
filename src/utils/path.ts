import os from "node:os";
import path from "node:path";

export interface ExpandPathOptions {
  homedir?: string;
  env?: Record<string, string | undefined>;
}

const ENV_REFERENCE = /\$(\w+|\{[^}]*\})/g;

/** Expands a leading `~` and `$NAME` / `${NAME}` references. Unset variables stay as written. */
export function expandPath(input: string, options: ExpandPathOptions = {}): string {
  return expandEnvVars(expandHome(input, options.homedir ?? os.homedir()), options.env ?? process.env);
}

export function expandHome(input: string, homedir: string): string {
  if (input === "~") {
    return homedir;
  }

  if (input.startsWith("~/") || (path.sep === "\\" && input.startsWith("~\\"))) {
    return joinPath(homedir, input.slice(2));
  }

  return input;
}

export function expandEnvVars(input: string, env: Record<string, string | undefined>): string {
  if (!input.includes("$")) {
    return input;
  }

  return input.replace(ENV_REFERENCE, (match, reference: string) => {
    const name = reference.startsWith("{") ? reference.slice(1, -1) : reference;
    const value = env[name];
    return value === undefined ? match : value;
  });
}

export function resolveUserPath(input: string): string {
  return path.resolve(expandPath(input));
}

/**
 * Joins without normalizing. An absolute `child` replaces `root`, and a
 * separator is only added when `root` does not already end with one.
 */
export function joinPath(root: string, child: string): string {
  if (!root || path.isAbsolute(child)) {
    return child;
  }

  if (isSeparator(root.charAt(root.length - 1))) {
    return `${root}${child}`;
  }

  return `${root}${path.sep}${child}`;
}

/** Splits at the last separator; the directory keeps its trailing separator. */
export function splitPath(input: string): { dir: string; base: string } {
  let index = input.length - 1;
  while (index >= 0 && !isSeparator(input.charAt(index))) {
    index -= 1;
  }

  return {
    dir: input.slice(0, index + 1),
    base: input.slice(index + 1)
  };
}

function isSeparator(char: string): boolean {
  return char === "/" || (path.sep === "\\" && char === "\\");
}
