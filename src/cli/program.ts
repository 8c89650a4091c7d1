import { Command } from "commander";
import { createAppContext, type AppContext } from "./context.js";
import { formatConfigValue, readLegacyConfigFile } from "../config/legacy.js";
import { parseLogLevel, stringifyConfigNode } from "../config/settings.js";
import { ConfigLoadError, NotFoundError, ValidationError } from "../shared/errors.js";
import { CONFIG_PATH_ENV, DEFAULT_CONFIG_FILE } from "../shared/constants.js";
import type { RawConfigMap } from "../shared/types.js";
import { resolveUserPath } from "../utils/path.js";

interface GlobalOptions {
  config?: string;
  logLevel: string;
}

export async function runCli(argv: string[]): Promise<void> {
  const program = new Command();
  program
    .name("labrec")
    .description("Inspect XDF recorder configuration and the output path it resolves to")
    .option("-c, --config <path>", `Config file (.cfg or .json); defaults to $${CONFIG_PATH_ENV}`)
    .option("--log-level <level>", "debug, info, warn or error", "warn");

  program
    .command("filename")
    .description("Print the resolved recording path")
    .action(() => {
      const context = createContext(program.opts<GlobalOptions>());
      console.log(context.config.getString("filename", ""));
    });

  program
    .command("get")
    .argument("<key>", "Dot path, e.g. remote_control.port")
    .action((key: string) => {
      const context = createContext(program.opts<GlobalOptions>());
      const value = context.config.get(key);
      if (value === undefined) {
        throw new NotFoundError(`No config value at ${key}`);
      }
      console.log(stringifyConfigNode(value));
    });

  program
    .command("show")
    .description("Print the effective configuration as JSON")
    .option("--settings", "Print the typed settings view instead of the raw tree")
    .action((options: { settings?: boolean }) => {
      const context = createContext(program.opts<GlobalOptions>());
      const payload = options.settings ? context.config.toSettings() : context.config.toJSON();
      console.log(JSON.stringify(payload, null, 2));
    });

  program
    .command("parse")
    .description("Print the typed key/value pairs of a legacy .cfg file")
    .argument("<file>", "Legacy config file")
    .option("--json", "Output JSON")
    .action((file: string, options: { json?: boolean }) => {
      const filePath = resolveUserPath(file);
      const cfg = readLegacyFile(filePath);

      if (options.json) {
        console.log(JSON.stringify(Object.fromEntries(cfg), null, 2));
        return;
      }

      for (const [key, value] of cfg) {
        console.log(`${key}=${value.kind}:${formatConfigValue(value)}`);
      }
    });

  program
    .command("export")
    .description("Write the effective configuration as JSON")
    .argument("<out>", "Destination file")
    .action((out: string) => {
      const context = createContext(program.opts<GlobalOptions>());
      const destination = resolveUserPath(out);
      context.config.saveToFile(destination);
      console.log(`Wrote ${destination}`);
    });

  await program.parseAsync(argv);
}

function createContext(options: GlobalOptions): AppContext {
  return createAppContext({
    configPathOverride: options.config,
    logLevel: parseLogLevel(options.logLevel)
  });
}

function readLegacyFile(filePath: string): RawConfigMap {
  try {
    return readLegacyConfigFile(filePath);
  } catch (error) {
    throw new ConfigLoadError(filePath, error);
  }
}

export function handleCliError(error: unknown): number {
  if (error instanceof NotFoundError || error instanceof ValidationError || error instanceof ConfigLoadError) {
    console.error(error.message);
    return 2;
  }

  if (error instanceof Error) {
    console.error(error.message);
    return 1;
  }

  console.error("Unknown error");
  return 1;
}

export function printHelpHint(): void {
  console.error(`Run 'labrec help' for usage. Default config file: ${DEFAULT_CONFIG_FILE}`);
}
