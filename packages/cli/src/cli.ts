#!/usr/bin/env node

/**
 * prefixwatch CLI entry point
 */

import { run } from "./program.js";

process.exitCode = await run(process.argv);
