#!/usr/bin/env node
import { runCli } from "./index.js";

runCli(process.argv).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error("subvol-rotate failed:", err);
    process.exitCode = 1;
  },
);
