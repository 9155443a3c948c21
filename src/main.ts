#!/usr/bin/env node
import { runCli } from "./cli.js";
import { loadConfig, type Config } from "./config.js";
import { toProblem } from "./errors.js";
import { createLogger } from "./logger.js";

let config: Config;
try {
  config = loadConfig();
} catch (e) {
  console.error(JSON.stringify(toProblem(e)));
  process.exit(1);
}

const logger = createLogger({ level: config.logLevel, format: config.logFormat });

// processing is discarded on interrupt; nothing partial is written
process.once("SIGINT", () => {
  logger.warn("interrupted");
  process.exit(130);
});

process.exitCode = await runCli(process.argv.slice(2), {
  config,
  logger,
  out: (text) => console.log(text),
});
