#!/usr/bin/env node
import { main } from "../cli.js";
import { closeLogger } from "../logger.js";

main(process.argv.slice(2))
  .then(async (code) => {
    await closeLogger();
    process.exitCode = code;
  })
  .catch((err) => {
    console.error("Fatal error:", err);
    process.exit(1);
  });
