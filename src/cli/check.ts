#!/usr/bin/env node
import { runCheck } from "./commands";

runCheck(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error("[deploy-marker] failed:", err);
    process.exit(1);
  });
