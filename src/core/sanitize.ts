import type { ResolutionEnvironment } from "../shared/types.js";
import { expandPath, splitPath } from "../utils/path.js";

// Characters Windows rejects in file names; applied on every platform.
const RESERVED_CHARACTERS = /[<>:"/\\|?*]/g;

export function sanitizeBaseName(name: string): string {
  return name.replace(RESERVED_CHARACTERS, "-").replace(/[ .]+$/, "");
}

/** Cleans the last path component only, then expands `~` and environment references. */
export function sanitizeOutputPath(
  candidate: string,
  environment: Pick<ResolutionEnvironment, "homedir" | "env">
): string {
  const { dir, base } = splitPath(candidate);
  return expandPath(`${dir}${sanitizeBaseName(base)}`, {
    homedir: environment.homedir(),
    env: environment.env
  });
}
