#!/usr/bin/env node

import { runCli } from "./cli/run.js";
import { shouldUseColor } from "./utils/ansi.js";
import { errorMessage } from "./utils/errors.js";
import { logger } from "./utils/logger.js";

runCli(process.argv.slice(2), {
  output: {
    print: (line) => console.log(line),
    printError: (line) => console.error(line),
  },
  color: shouldUseColor(process.stdout),
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    logger.error({ err }, "Unexpected failure");
    console.error(`Error: ${errorMessage(err)}`);
    process.exitCode = 1;
  });
