#!/usr/bin/env node
import { runPublish } from "./commands";

runPublish(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error("[deploy-marker] failed:", err);
    process.exit(1);
  });
