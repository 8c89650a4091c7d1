import os from "node:os";
import path from "node:path";
import type { ConfigTree, PlaceholderName } from "./types.js";

export const APP_NAME = "lab-recorder";
export const CONFIG_FILE_NAME = "config.json";
export const CONFIG_PATH_ENV = "LABREC_CONFIG";

export const DEFAULT_CONFIG_DIR = path.join(os.homedir(), ".config", APP_NAME);
export const DEFAULT_CONFIG_FILE = path.join(DEFAULT_CONFIG_DIR, CONFIG_FILE_NAME);

export const DEFAULT_FILENAME = "recording.xdf";
export const RECORDING_EXTENSION = ".xdf";
export const LEGACY_CONFIG_EXTENSION = ".cfg";

export const DEFAULT_CONFIG: ConfigTree = {
  filename: DEFAULT_FILENAME,
  remote_control: {
    enabled: true,
    port: 22345
  },
  recording: {
    buffer_size: 360,
    max_samples_per_pull: 500,
    clock_sync_interval: 5.0
  },
  streams: {
    timeout: 2.0,
    recover: true
  }
};

export const PLACEHOLDER_NAMES: readonly PlaceholderName[] = [
  "datetime",
  "date",
  "time",
  "hostname",
  "m",
  "p",
  "s",
  "b",
  "a",
  "r"
];

/** Legacy keys feeding the identity placeholders, with their fallbacks. */
export const IDENTITY_PLACEHOLDERS: ReadonlyArray<{ name: PlaceholderName; key: string; fallback: string }> = [
  { name: "m", key: "BidsModality", fallback: "eeg" },
  { name: "p", key: "Participant", fallback: "P001" },
  { name: "s", key: "Session", fallback: "S001" },
  { name: "b", key: "Block", fallback: "task" },
  { name: "a", key: "Acq", fallback: "acq" },
  { name: "r", key: "Run", fallback: "01" }
];
