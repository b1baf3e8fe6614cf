#!/usr/bin/env node

import { build, parseBuildArgs, UsageError } from "./build.js";
import { Logger } from "./internal/logger.js";

const USAGE = `
atomcss - Compile atomic CSS from style definitions

Usage:
  atomcss build [options] <definitions.js>

Options:
  --out <path>       Write the stylesheet to a file (default: stdout)
  --input <path>     Host stylesheet; replaces its @import "atomcss"; line
  --config <path>    Config module (must export default config object)
  --no-stats         Leave out the entry counts comment
  --help, -h         Show this help message

Examples:
  atomcss build styles/definitions.js
  atomcss build --out dist/styles.css styles/definitions.js
  atomcss build --input src/app.css --out dist/app.css styles/definitions.js
`;

async function main(args: string[]): Promise<number> {
  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    process.stdout.write(USAGE);
    return 0;
  }

  const [command, ...rest] = args;
  if (command !== "build") {
    Logger.logError(`Unknown command: ${command}\n${USAGE}`, "atomcss");
    return 2;
  }

  let source = "atomcss build";
  try {
    const options = parseBuildArgs(rest);
    source = options.definitions;
    const result = await build(options);
    if (options.out) {
      Logger.info(`${result.written === "written" ? "Wrote" : "Unchanged"} ${options.out}`);
    } else {
      process.stdout.write(`${result.css}\n`);
    }
  } catch (error) {
    Logger.logError(error instanceof Error ? error.message : String(error), source);
    return error instanceof UsageError ? 2 : 1;
  }

  const report = Logger.createReport();
  if (report.getWarnings().length > 0) {
    report.print();
  }
  return 0;
}

process.exitCode = await main(process.argv.slice(2));
