#!/usr/bin/env tsx

// CLI entry point for the Feature.fm API test harness
import chalk from "chalk";
import { EXIT_INTERRUPTED, startCLI } from "./cli/cli-runner";

async function main() {
  process.exitCode = await startCLI();
}

process.on("SIGINT", () => {
  console.log(chalk.yellow("\n\nTests interrupted by user"));
  process.exit(EXIT_INTERRUPTED);
});

// Handle unhandled promise rejections
process.on("unhandledRejection", (reason) => {
  console.error("Unhandled Rejection:", reason);
  process.exit(1);
});

main().catch((error) => {
  console.error("CLI Error:", error);
  process.exit(1);
});
