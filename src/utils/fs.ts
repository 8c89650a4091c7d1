import fs from "node:fs";

export function readTextFileSync(filePath: string): string {
  return fs.readFileSync(filePath, "utf8");
}

export function readJsonFileSync(filePath: string): unknown {
  return JSON.parse(readTextFileSync(filePath));
}

export function writeJsonFileSync(filePath: string, data: unknown): void {
  fs.writeFileSync(filePath, `${JSON.stringify(data, null, 2)}\n`, "utf8");
}

export function fileExists(filePath: string): boolean {
  try {
    fs.accessSync(filePath, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
}
