/* eslint-disable no-console */
import { getConfig } from "./config.js";
import { logger } from "./logger.js";
import { start, SERVER_NAME, SERVER_VERSION } from "./server.js";

interface CliOptions {
  showHelp: boolean;
  showVersion: boolean;
}

function parseArguments(args: string[]): CliOptions {
  let showHelp = false;
  let showVersion = false;

  for (const arg of args) {
    if (arg === "--help" || arg === "-h") {
      showHelp = true;
    }

    if (arg === "--version" || arg === "-v") {
      showVersion = true;
    }
  }

  return { showHelp, showVersion };
}

function printHelp(): void {
  console.log(
    `${SERVER_NAME} v${SERVER_VERSION}\n\n` +
      `Usage: ${SERVER_NAME} [options]\n\n` +
      `Serves 1R rule induction tools over MCP on stdio.\n\n` +
      `Options:\n` +
      `  --help, -h     Show this help message\n` +
      `  --version, -v  Print the current version\n\n` +
      `Environment:\n` +
      `  ONE_RULE_LOG_LEVEL  debug | info | warn | error (default: info)`,
  );
}

/**
 * Entry point behind the `mcp-one-rule` binary. Failures set
 * `process.exitCode` instead of rejecting.
 */
export async function runCli(args: string[]): Promise<void> {
  const cliOptions = parseArguments(args);

  if (cliOptions.showVersion) {
    console.log(`${SERVER_NAME} v${SERVER_VERSION}`);
    return;
  }

  if (cliOptions.showHelp) {
    printHelp();
    return;
  }

  // The logger reads this config, so it cannot report a bad one
  try {
    getConfig();
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
    return;
  }

  try {
    await start();
  } catch (error) {
    logger.error(`Failed to start ${SERVER_NAME} server`, "cli", error);
    process.exitCode = 1;
  }
}
