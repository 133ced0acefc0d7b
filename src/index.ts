#!/usr/bin/env node

import { createInterruptHandler, main } from "./cli.js";

const controller = new AbortController();
const interrupt = createInterruptHandler(controller, (code) => process.exit(code));

process.on("SIGINT", interrupt);
process.on("SIGTERM", interrupt);

main(process.argv, { signal: controller.signal })
  .then((code) => {
    process.exit(code);
  })
  .catch((err) => {
    console.error("Error:", err instanceof Error ? err.message : String(err));
    process.exit(1);
  });
