import { PLACEHOLDER_NAMES } from "../shared/constants.js";
import type { PlaceholderSet } from "../shared/types.js";

/**
 * Replaces `%name` tokens in one pass. Longer names are tried first so
 * `%datetime` is never read as `%date` followed by `time`, and substituted
 * values are not scanned again.
 */
export function expandTemplate(template: string, placeholders: Partial<PlaceholderSet>): string {
  const values = new Map<string, string>();
  for (const name of PLACEHOLDER_NAMES) {
    const value = placeholders[name];
    if (value !== undefined) {
      values.set(name, value);
    }
  }

  if (values.size === 0 || !template.includes("%")) {
    return template;
  }

  const alternation = [...values.keys()]
    .sort((left, right) => right.length - left.length)
    .map(escapeRegExp)
    .join("|");
  const pattern = new RegExp(`%(${alternation})`, "g");

  return template.replace(pattern, (match: string, name: string) => values.get(name) ?? match);
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
