#!/usr/bin/env node
/**
 * taq-import – CLI
 * Splits a TAQ trade file into chunks and loads them in parallel.
 */

import { config as loadEnv } from "dotenv";
import { errorMessage } from "./core/domain/errors.js";
import { buildProgram } from "./cli.js";
import { loadSecrets } from "./infrastructure/services/secrets.service.js";

loadEnv();
for (const warning of loadSecrets()) console.warn(warning);

buildProgram()
  .parseAsync(process.argv)
  .catch((e: unknown) => {
    console.error("Import failed:", errorMessage(e));
    process.exit(1);
  });
