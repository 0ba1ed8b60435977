#!/usr/bin/env node

/**
 * hello CLI entry point.
 *
 *   hello [FLAGS] TEXT
 *   hello --help
 *   hello --version
 */

import { runHello } from "./main.js";

try {
  process.exitCode = runHello();
} catch (err) {
  console.error("Fatal error:", err);
  process.exitCode = 1;
}
