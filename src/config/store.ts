import { DEFAULT_CONFIG, DEFAULT_FILENAME, LEGACY_CONFIG_EXTENSION } from "../shared/constants.js";
import { ConfigLoadError } from "../shared/errors.js";
import { createLogger, type AppLogger } from "../shared/logger.js";
import type { ConfigNode, ConfigTree, RawConfigMap, RecorderSettings, ResolutionEnvironment } from "../shared/types.js";
import { defaultEnvironment } from "../core/environment.js";
import { resolveRecordingFilename } from "../core/filename.js";
import { fileExists, readJsonFileSync, writeJsonFileSync } from "../utils/fs.js";
import { coerceInteger, readLegacyConfigFile, toStringList } from "./legacy.js";
import { buildSettings } from "./settings.js";
import { cloneTree, deepMerge, getPath, isConfigNode, isConfigTree, setPath } from "./tree.js";

export interface HierarchicalConfigOptions {
  logger?: AppLogger;
  environment?: ResolutionEnvironment;
  /** Loaded through {@link HierarchicalConfig.tryLoad} when the file exists. */
  configFile?: string;
}

/**
 * Effective recorder configuration: the default tree, optionally overlaid
 * by one `.cfg` or JSON file. Values are addressed by dot paths such as
 * `remote_control.port`.
 */
export class HierarchicalConfig {
  private tree: ConfigTree;
  private readonly logger: AppLogger;
  private readonly environment: ResolutionEnvironment;

  constructor(options: HierarchicalConfigOptions = {}) {
    this.tree = cloneTree(DEFAULT_CONFIG);
    this.logger = options.logger ?? createLogger("silent");
    this.environment = options.environment ?? defaultEnvironment();

    if (options.configFile && fileExists(options.configFile)) {
      this.tryLoad(options.configFile);
    }
  }

  get(dotPath: string): ConfigNode | undefined;
  get(dotPath: string, fallback: ConfigNode): ConfigNode;
  get(dotPath: string, fallback?: ConfigNode): ConfigNode | undefined {
    const value = getPath(this.tree, dotPath);
    return value === undefined ? fallback : value;
  }

  getString(dotPath: string, fallback: string): string {
    const value = this.get(dotPath);
    return typeof value === "string" ? value : fallback;
  }

  getNumber(dotPath: string, fallback: number): number {
    const value = this.get(dotPath);
    return typeof value === "number" ? value : fallback;
  }

  getBoolean(dotPath: string, fallback: boolean): boolean {
    const value = this.get(dotPath);
    return typeof value === "boolean" ? value : fallback;
  }

  getStringList(dotPath: string, fallback: string[]): string[] {
    const value = this.get(dotPath);
    if (Array.isArray(value) && value.every((item): item is string => typeof item === "string")) {
      return [...value];
    }
    return fallback;
  }

  set(dotPath: string, value: ConfigNode): void {
    setPath(this.tree, dotPath, value);
  }

  merge(overlay: ConfigTree): void {
    this.tree = deepMerge(this.tree, overlay);
  }

  /**
   * Loads a `.cfg` (legacy) or JSON file. The store is only updated when the
   * whole file applies; otherwise it throws {@link ConfigLoadError} and keeps
   * its previous state.
   */
  loadFromFile(filePath: string): void {
    const staged = new HierarchicalConfig({ logger: this.logger, environment: this.environment });
    staged.tree = cloneTree(this.tree);

    try {
      if (filePath.toLowerCase().endsWith(LEGACY_CONFIG_EXTENSION)) {
        staged.applyLegacyFile(filePath);
      } else {
        staged.applyJsonFile(filePath);
      }
    } catch (error) {
      throw new ConfigLoadError(filePath, error);
    }

    this.tree = staged.tree;
    this.logger.debug({ filePath }, "config loaded");
  }

  /** Like {@link loadFromFile}, but reports a failure and returns `false` instead of throwing. */
  tryLoad(filePath: string): boolean {
    try {
      this.loadFromFile(filePath);
      return true;
    } catch (error) {
      this.logger.warn({ err: error, filePath }, "could not load config file, keeping current values");
      return false;
    }
  }

  saveToFile(filePath: string): void {
    writeJsonFileSync(filePath, this.tree);
    this.logger.debug({ filePath }, "config saved");
  }

  toJSON(): ConfigTree {
    return cloneTree(this.tree);
  }

  toSettings(): RecorderSettings {
    return buildSettings(this);
  }

  private applyJsonFile(filePath: string): void {
    const parsed = readJsonFileSync(filePath);
    if (!isConfigTree(parsed) || !isConfigNode(parsed)) {
      throw new TypeError("top-level JSON value must be an object");
    }
    this.merge(parsed);
  }

  private applyLegacyFile(filePath: string): void {
    const cfg = readLegacyConfigFile(filePath);

    this.set(
      "filename",
      resolveRecordingFilename(cfg, {
        fallbackFilename: this.getString("filename", DEFAULT_FILENAME),
        environment: this.environment
      })
    );

    const enabled = readInteger(cfg, "RCSEnabled");
    if (enabled !== undefined) {
      this.set("remote_control.enabled", enabled !== 0);
    }

    const port = readInteger(cfg, "RCSPort");
    if (port !== undefined) {
      this.set("remote_control.port", port);
    }

    const autoStart = readInteger(cfg, "AutoStart");
    if (autoStart !== undefined) {
      this.set("auto_start", autoStart !== 0);
    }

    const required = cfg.get("RequiredStreams");
    if (required !== undefined) {
      this.set("streams.required_labels", toStringList(required));
    }
  }
}

// Missing or non-integer fields are skipped without failing the load.
function readInteger(cfg: RawConfigMap, key: string): number | undefined {
  const value = cfg.get(key);
  return value === undefined ? undefined : coerceInteger(value);
}
