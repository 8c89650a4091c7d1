import os from "node:os";
import { describe, expect, it } from "vitest";
import { parseLegacyConfig } from "../src/config/legacy.js";
import { ensureExtension, resolveRecordingFilename } from "../src/core/filename.js";
import { fixedEnvironment } from "./helpers.js";

function resolve(lines: string[], fallbackFilename?: string): string {
  return resolveRecordingFilename(parseLegacyConfig(lines.join("\n")), {
    fallbackFilename,
    environment: fixedEnvironment()
  });
}

describe("resolveRecordingFilename", () => {
  it("prefers StorageLocation over StudyRoot and PathTemplate", () => {
    expect(resolve(["StorageLocation=%hostname.xdf", "StudyRoot=/data", "PathTemplate=other.xdf"])).toBe("labpc.xdf");
  });

  it("joins StudyRoot with the expanded PathTemplate", () => {
    expect(
      resolve(["StudyRoot=/data", "PathTemplate=sub-%p/ses-%s/%m/sub-%p_ses-%s_task-%b_run-%r_%m.xdf"])
    ).toBe("/data/sub-P001/ses-S001/eeg/sub-P001_ses-S001_task-task_run-01_eeg.xdf");
  });

  it("builds a default name under StudyRoot alone", () => {
    expect(resolve(["StudyRoot=/data"])).toBe("/data/LabRecorder_labpc_2025-03-14T092653.589Z_eeg.xdf");
  });

  it("uses the real clock and hostname by default", () => {
    const resolved = resolveRecordingFilename(parseLegacyConfig("StudyRoot=/data"));
    const hostname = os.hostname().replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
    expect(resolved).toMatch(new RegExp(`^/data/LabRecorder_${hostname}_\\d{4}-\\d{2}-\\d{2}T\\d{6}\\.\\d{3}Z_eeg\\.xdf$`));
  });

  it("keeps long numeric identifiers exact", () => {
    const run = "9".repeat(400);
    expect(resolve(["Participant=12345678901234567891", `Run=${run}`, "PathTemplate=%p_%r"])).toBe(
      `12345678901234567891_${run}.xdf`
    );
  });

  it("expands PathTemplate alone without joining", () => {
    expect(resolve(["PathTemplate=%p_%date"])).toBe("P001_2025-03-14.xdf");
  });

  it("falls back to the given filename", () => {
    expect(resolve([])).toBe("recording.xdf");
    expect(resolve(["Participant=P042"], "session.XDF")).toBe("session.XDF");
  });

  it("ignores empty path fields", () => {
    expect(resolve(["StorageLocation=", "StudyRoot=", "PathTemplate=%p"])).toBe("P001.xdf");
  });

  it("keeps an absolute PathTemplate instead of joining it", () => {
    expect(resolve(["StudyRoot=/data", "PathTemplate=/other/run"])).toBe("/other/run.xdf");
  });

  it("expands environment references and the home directory", () => {
    expect(resolve(["StorageLocation=$DATA_ROOT/%p/run%r", "Run=2"])).toBe("/mnt/data/P001/run2.xdf");
    expect(resolve(["StorageLocation=~/rec/a:b?c"])).toBe("/home/tester/rec/a-b-c.xdf");
  });

  it("sanitizes the base name after adding the extension", () => {
    expect(resolve(["StudyRoot=/data", "PathTemplate=sub-%p/take:%r"])).toBe("/data/sub-P001/take-01.xdf");
  });
});

describe("ensureExtension", () => {
  it("appends .xdf exactly once", () => {
    expect(ensureExtension("/data/take")).toBe("/data/take.xdf");
    expect(ensureExtension("/data/take.xdf")).toBe("/data/take.xdf");
    expect(ensureExtension("/data/take.XDF")).toBe("/data/take.XDF");
    expect(ensureExtension("/data/take.xdf.bak")).toBe("/data/take.xdf.bak.xdf");
  });
});
