#!/usr/bin/env node

import { createProgram } from "./program.js";
import { log } from "./util/logger.js";

createProgram().parseAsync(process.argv).catch((err: unknown) => {
  log.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
