import { describe, expect, it } from "vitest";
import { expandEnvVars, expandHome, expandPath, joinPath, splitPath } from "../src/utils/path.js";

describe("path helpers", () => {
  it("expands set environment variables and leaves unset ones", () => {
    expect(expandEnvVars("${A}/$B/$MISSING/x", { A: "one", B: "two" })).toBe("one/two/$MISSING/x");
  });

  it("expands a leading tilde", () => {
    expect(expandHome("~", "/home/tester")).toBe("/home/tester");
    expect(expandHome("~/rec/a.xdf", "/home/tester")).toBe("/home/tester/rec/a.xdf");
    expect(expandHome("/data/~/a.xdf", "/home/tester")).toBe("/data/~/a.xdf");
  });

  it("expands home before environment references", () => {
    expect(expandPath("~/$STUDY/a.xdf", { homedir: "/home/tester", env: { STUDY: "s1" } })).toBe(
      "/home/tester/s1/a.xdf"
    );
  });

  it("joins without doubling separators", () => {
    expect(joinPath("/data", "rec.xdf")).toBe("/data/rec.xdf");
    expect(joinPath("/data/", "rec.xdf")).toBe("/data/rec.xdf");
  });

  it("lets an absolute child replace the root", () => {
    expect(joinPath("/data", "/other/rec.xdf")).toBe("/other/rec.xdf");
  });

  it("splits at the last separator", () => {
    expect(splitPath("/data/sub/rec.xdf")).toEqual({ dir: "/data/sub/", base: "rec.xdf" });
    expect(splitPath("rec.xdf")).toEqual({ dir: "", base: "rec.xdf" });
  });
});
