import os from "node:os";
import type { ResolutionEnvironment } from "../shared/types.js";

export function defaultEnvironment(): ResolutionEnvironment {
  return {
    now: () => new Date(),
    hostname: () => os.hostname(),
    homedir: () => os.homedir(),
    env: process.env
  };
}
