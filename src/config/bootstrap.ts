import path from "node:path";
import { CONFIG_PATH_ENV, DEFAULT_CONFIG_FILE } from "../shared/constants.js";
import { NotFoundError } from "../shared/errors.js";
import { fileExists } from "../utils/fs.js";
import { expandPath } from "../utils/path.js";

/**
 * Picks the config file for this run: the CLI flag, then `LABREC_CONFIG`,
 * then the per-user default when it exists. `null` means defaults only.
 * An explicitly named file that does not exist is an error.
 */
export function resolveConfigPath(
  cliOverride?: string,
  env: Record<string, string | undefined> = process.env,
  defaultPath: string = DEFAULT_CONFIG_FILE
): string | null {
  const explicit = cliOverride ?? env[CONFIG_PATH_ENV];
  if (explicit) {
    const resolved = path.resolve(expandPath(explicit, { env }));
    if (!fileExists(resolved)) {
      throw new NotFoundError(`Config file not found: ${resolved}`);
    }
    return resolved;
  }

  return fileExists(defaultPath) ? defaultPath : null;
}
