#!/usr/bin/env tsx
import "dotenv/config";
import { hideBin } from "yargs/helpers";
import { runCli } from "./cli";

runCli(hideBin(process.argv))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error("[cli] fatal:", err);
    process.exitCode = 1;
  });
