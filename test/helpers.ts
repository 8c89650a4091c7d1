import type { ResolutionEnvironment } from "../src/shared/types.js";

export const FIXED_INSTANT = new Date(Date.UTC(2025, 2, 14, 9, 26, 53, 589));

export function fixedEnvironment(overrides: Partial<ResolutionEnvironment> = {}): ResolutionEnvironment {
  return {
    now: () => FIXED_INSTANT,
    hostname: () => "labpc",
    homedir: () => "/home/tester",
    env: { DATA_ROOT: "/mnt/data" },
    ...overrides
  };
}
