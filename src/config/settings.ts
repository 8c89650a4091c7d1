import { DEFAULT_CONFIG, DEFAULT_FILENAME } from "../shared/constants.js";
import { ValidationError } from "../shared/errors.js";
import { LOG_LEVELS, type ConfigNode, type LogLevel, type RecorderSettings } from "../shared/types.js";
import { getPath } from "./tree.js";

interface SettingsSource {
  getString(dotPath: string, fallback: string): string;
  getNumber(dotPath: string, fallback: number): number;
  getBoolean(dotPath: string, fallback: boolean): boolean;
  getStringList(dotPath: string, fallback: string[]): string[];
}

/** Typed view for the recording engine and remote-control server. Mistyped nodes fall back to the defaults. */
export function buildSettings(source: SettingsSource): RecorderSettings {
  return {
    filename: source.getString("filename", DEFAULT_FILENAME),
    autoStart: source.getBoolean("auto_start", false),
    remoteControl: {
      enabled: source.getBoolean("remote_control.enabled", defaultBoolean("remote_control.enabled")),
      port: source.getNumber("remote_control.port", defaultNumber("remote_control.port"))
    },
    recording: {
      bufferSize: source.getNumber("recording.buffer_size", defaultNumber("recording.buffer_size")),
      maxSamplesPerPull: source.getNumber("recording.max_samples_per_pull", defaultNumber("recording.max_samples_per_pull")),
      clockSyncInterval: source.getNumber("recording.clock_sync_interval", defaultNumber("recording.clock_sync_interval"))
    },
    streams: {
      timeout: source.getNumber("streams.timeout", defaultNumber("streams.timeout")),
      recover: source.getBoolean("streams.recover", defaultBoolean("streams.recover")),
      requiredLabels: source.getStringList("streams.required_labels", [])
    }
  };
}

export function parseLogLevel(value: string): LogLevel {
  const level = LOG_LEVELS.find((candidate) => candidate === value.trim().toLowerCase());
  if (!level) {
    throw new ValidationError(`logLevel must be one of: ${LOG_LEVELS.join(", ")}`);
  }
  return level;
}

/** Text form of a node for terminal output: strings as-is, everything else as JSON. */
export function stringifyConfigNode(value: ConfigNode): string {
  return typeof value === "string" ? value : JSON.stringify(value, null, 2);
}

function defaultNumber(dotPath: string): number {
  const value = getPath(DEFAULT_CONFIG, dotPath);
  if (typeof value !== "number") {
    throw new TypeError(`default for ${dotPath} is not a number`);
  }
  return value;
}

function defaultBoolean(dotPath: string): boolean {
  const value = getPath(DEFAULT_CONFIG, dotPath);
  if (typeof value !== "boolean") {
    throw new TypeError(`default for ${dotPath} is not a boolean`);
  }
  return value;
}
