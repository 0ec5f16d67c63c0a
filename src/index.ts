#!/usr/bin/env node

/**
 * GraphQL predicate mapping CLI. See ./cli.ts for the options.
 */

import * as fs from "node:fs";
import { parseArgs, run } from "./cli.js";

function main() {
  try {
    const args = parseArgs(process.argv.slice(2));
    const output = run(args, (path) => fs.readFileSync(path, "utf-8"));
    console.log(output);
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}

main();
