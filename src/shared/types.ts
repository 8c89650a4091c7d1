export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

/**
 * One right-hand side of a legacy `.cfg` line after typing. Integers keep
 * their canonical decimal text, which stays exact past 2^53.
 */
export type ConfigValue =
  | { kind: "string"; value: string }
  | { kind: "integer"; value: number; text: string }
  | { kind: "float"; value: number }
  | { kind: "list"; value: string[] };

export type ConfigValueKind = ConfigValue["kind"];

export type RawConfigMap = Map<string, ConfigValue>;

export type PlaceholderName = "datetime" | "date" | "time" | "hostname" | "m" | "p" | "s" | "b" | "a" | "r";

export type PlaceholderSet = Record<PlaceholderName, string>;

export type ConfigScalar = string | number | boolean | null;

export type ConfigNode = ConfigScalar | ConfigNode[] | ConfigTree;

export interface ConfigTree {
  [key: string]: ConfigNode;
}

/**
 * Everything filename resolution reads from the outside world. Tests pass a
 * fixed clock and hostname; the CLI uses {@link defaultEnvironment}.
 */
export interface ResolutionEnvironment {
  now(): Date;
  hostname(): string;
  homedir(): string;
  env: Record<string, string | undefined>;
}

export interface RecorderSettings {
  filename: string;
  autoStart: boolean;
  remoteControl: {
    enabled: boolean;
    port: number;
  };
  recording: {
    bufferSize: number;
    maxSamplesPerPull: number;
    clockSyncInterval: number;
  };
  streams: {
    timeout: number;
    recover: boolean;
    requiredLabels: string[];
  };
}
