import type { ConfigNode, ConfigTree } from "../shared/types.js";

export function isConfigTree(value: unknown): value is ConfigTree {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function cloneTree(tree: ConfigTree): ConfigTree {
  return structuredClone(tree);
}

export function splitDotPath(dotPath: string): string[] {
  return dotPath.split(".");
}

/** Returns `undefined` as soon as a segment is missing or a non-final node is not a mapping. */
export function getPath(tree: ConfigTree, dotPath: string): ConfigNode | undefined {
  let current: ConfigNode = tree;
  for (const segment of splitDotPath(dotPath)) {
    if (!isConfigTree(current) || !Object.hasOwn(current, segment)) {
      return undefined;
    }
    const next: ConfigNode | undefined = current[segment];
    if (next === undefined) {
      return undefined;
    }
    current = next;
  }
  return current;
}

/** Creates intermediate mappings as needed, replacing any scalar in the way. */
export function setPath(tree: ConfigTree, dotPath: string, value: ConfigNode): void {
  const segments = splitDotPath(dotPath);
  const last = segments.pop() ?? dotPath;

  let current = tree;
  for (const segment of segments) {
    const existing = Object.hasOwn(current, segment) ? current[segment] : undefined;
    if (isConfigTree(existing)) {
      current = existing;
      continue;
    }
    const created: ConfigTree = {};
    defineEntry(current, segment, created);
    current = created;
  }

  defineEntry(current, last, value);
}

/**
 * Returns a new tree: keys holding a mapping on both sides merge
 * recursively, anything else is replaced by a copy of the overlay value.
 */
export function deepMerge(base: ConfigTree, overlay: ConfigTree): ConfigTree {
  const result = cloneTree(base);
  for (const [key, value] of Object.entries(overlay)) {
    const existing = Object.hasOwn(result, key) ? result[key] : undefined;
    if (isConfigTree(existing) && isConfigTree(value)) {
      defineEntry(result, key, deepMerge(existing, value));
    } else {
      defineEntry(result, key, structuredClone(value));
    }
  }
  return result;
}

// Plain assignment to "__proto__" would swap the prototype instead of adding a key.
function defineEntry(tree: ConfigTree, key: string, value: ConfigNode): void {
  Object.defineProperty(tree, key, { value, enumerable: true, writable: true, configurable: true });
}

/** Narrows parsed JSON to a config node, rejecting values JSON cannot hold. */
export function isConfigNode(value: unknown): value is ConfigNode {
  if (value === null || typeof value === "string" || typeof value === "boolean") {
    return true;
  }
  if (typeof value === "number") {
    return Number.isFinite(value);
  }
  if (Array.isArray(value)) {
    return value.every(isConfigNode);
  }
  if (isConfigTree(value)) {
    return Object.values(value).every(isConfigNode);
  }
  return false;
}
