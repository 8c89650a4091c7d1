import { describe, expect, it } from "vitest";
import { buildSettings, parseLogLevel, stringifyConfigNode } from "../src/config/settings.js";
import { HierarchicalConfig } from "../src/config/store.js";
import { ValidationError } from "../src/shared/errors.js";

describe("parseLogLevel", () => {
  it("accepts known levels in any case", () => {
    expect(parseLogLevel("debug")).toBe("debug");
    expect(parseLogLevel(" WARN ")).toBe("warn");
  });

  it("rejects unknown levels", () => {
    expect(() => parseLogLevel("verbose")).toThrow(ValidationError);
  });
});

describe("buildSettings", () => {
  it("reads the default tree", () => {
    expect(buildSettings(new HierarchicalConfig())).toEqual({
      filename: "recording.xdf",
      autoStart: false,
      remoteControl: { enabled: true, port: 22345 },
      recording: { bufferSize: 360, maxSamplesPerPull: 500, clockSyncInterval: 5 },
      streams: { timeout: 2, recover: true, requiredLabels: [] }
    });
  });

  it("falls back to defaults for mistyped nodes", () => {
    const store = new HierarchicalConfig();
    store.set("remote_control.port", "22400");
    store.set("streams.required_labels", ["EEG", 3]);

    const settings = buildSettings(store);
    expect(settings.remoteControl.port).toBe(22345);
    expect(settings.streams.requiredLabels).toEqual([]);
  });
});

describe("stringifyConfigNode", () => {
  it("prints strings raw and other nodes as JSON", () => {
    expect(stringifyConfigNode("/data/take.xdf")).toBe("/data/take.xdf");
    expect(stringifyConfigNode(22345)).toBe("22345");
    expect(stringifyConfigNode(["a"])).toBe('[\n  "a"\n]');
  });
});
