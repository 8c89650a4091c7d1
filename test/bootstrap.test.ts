import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { resolveConfigPath } from "../src/config/bootstrap.js";
import { NotFoundError } from "../src/shared/errors.js";

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

function makeTempDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "labrec-bootstrap-test-"));
  tempDirs.push(dir);
  return dir;
}

describe("resolveConfigPath", () => {
  it("prefers the CLI override", () => {
    const dir = makeTempDir();
    const cliFile = path.join(dir, "cli.cfg");
    const envFile = path.join(dir, "env.json");
    fs.writeFileSync(cliFile, "");
    fs.writeFileSync(envFile, "{}");

    expect(resolveConfigPath(cliFile, { LABREC_CONFIG: envFile }, path.join(dir, "default.json"))).toBe(cliFile);
  });

  it("falls back to LABREC_CONFIG with variables expanded", () => {
    const dir = makeTempDir();
    const envFile = path.join(dir, "env.json");
    fs.writeFileSync(envFile, "{}");

    expect(resolveConfigPath(undefined, { LABREC_CONFIG: "$CFG_DIR/env.json", CFG_DIR: dir }, path.join(dir, "none.json"))).toBe(
      envFile
    );
  });

  it("throws when an explicit file is missing", () => {
    const dir = makeTempDir();
    expect(() => resolveConfigPath(path.join(dir, "missing.cfg"), {}, path.join(dir, "default.json"))).toThrow(NotFoundError);
  });

  it("uses the default file only when it exists", () => {
    const dir = makeTempDir();
    const defaultFile = path.join(dir, "config.json");

    expect(resolveConfigPath(undefined, {}, defaultFile)).toBeNull();

    fs.writeFileSync(defaultFile, "{}");
    expect(resolveConfigPath(undefined, {}, defaultFile)).toBe(defaultFile);
  });
});
