#!/usr/bin/env node
import { handleCliError, printHelpHint, runCli } from "./cli/program.js";

runCli(process.argv).catch((error: unknown) => {
  process.exitCode = handleCliError(error);
  printHelpHint();
});
