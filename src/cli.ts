#!/usr/bin/env node
import { runCli } from "./cli-program";

runCli(process.argv).catch((error: unknown) => {
  console.error("fleet-sync: ERROR");
  console.error(error);
  process.exitCode = 1;
});
