#!/usr/bin/env node
import { runCli } from "./program.js";

runCli(process.argv)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  });
