import chalk from "chalk";
import Table from "cli-table3";
import type { ErrorEntry, RunSummary, TestStatus } from "../types";
import type { EnvironmentReport } from "../config/api-config";

export type ApiAvailability = Record<string, boolean | null>;

export interface DisplayOptions {
  /** Per-test status lines and section headers; summaries always print. */
  verbose?: boolean;
}

const RULE = "=".repeat(70);

export class ResultDisplayManager {
  private verbose: boolean;

  constructor(options: DisplayOptions = {}) {
    this.verbose = options.verbose ?? true;
  }

  isVerbose(): boolean {
    return this.verbose;
  }

  status(message: string, status?: TestStatus, indent: number = 0): void {
    if (!this.verbose) return;

    const prefix = "  ".repeat(indent);
    switch (status) {
      case "PASSED":
        console.log(`${prefix}${chalk.green(`✓ ${message}`)}`);
        break;
      case "FAILED":
        console.log(`${prefix}${chalk.red(`✗ ${message}`)}`);
        break;
      case "WARNING":
        console.log(`${prefix}${chalk.yellow(`⚠ ${message}`)}`);
        break;
      case "SKIPPED":
        console.log(`${prefix}${chalk.cyan(`→ ${message}`)}`);
        break;
      default:
        console.log(`${prefix}${message}`);
    }
  }

  testTitle(title: string): void {
    this.status(`\n[TEST] ${title}`);
  }

  header(title: string): void {
    if (this.verbose) {
      console.log(chalk.yellow(`\n━━━ ${title} ━━━`));
    }
  }

  info(message: string): void {
    console.log(message);
  }

  success(message: string): void {
    console.log(chalk.green(message));
  }

  warn(message: string): void {
    console.log(chalk.yellow(message));
  }

  error(message: string): void {
    console.error(chalk.red(message));
  }

  banner(lines: string[], tone: "info" | "danger" = "info"): void {
    const paint = tone === "danger" ? chalk.red : chalk.cyan;
    const width = 62;
    const body = lines.map(
      (line) => `║  ${line.padEnd(width - 4)}║`
    );
    console.log(
      paint(
        [`╔${"═".repeat(width - 2)}╗`, ...body, `╚${"═".repeat(width - 2)}╝`].join(
          "\n"
        )
      )
    );
  }

  runHeader(lines: string[], tone: "info" | "danger" = "info"): void {
    const paint = tone === "danger" ? chalk.red : chalk.cyan;
    console.log(paint(`\n${RULE}`));
    lines.forEach((line) => console.log(paint(line)));
    console.log(paint(RULE));
  }

  summary(
    envName: string,
    summary: RunSummary,
    endpointsTested: number,
    errors: ErrorEntry[]
  ): void {
    console.log(chalk.cyan(`\n${RULE}`));
    console.log(chalk.cyan(`Test Summary - ${envName} Environment`));
    console.log(chalk.cyan(RULE));

    const table = new Table({
      head: [chalk.blue.bold("Result"), chalk.blue.bold("Count")],
      colWidths: [20, 10],
      style: { head: [], border: [] },
    });
    table.push(
      ["Total Tests", summary.total.toString()],
      [chalk.green("✓ Passed"), summary.passed.toString()],
      [chalk.red("✗ Failed"), summary.failed.toString()],
      [chalk.yellow("⚠ Warnings"), summary.warnings.toString()],
      [chalk.cyan("→ Skipped"), summary.skipped.toString()]
    );
    console.log(table.toString());

    if (summary.total > 0) {
      const rate = (summary.passed / summary.total) * 100;
      const paint = rate >= 70 ? chalk.green : rate >= 50 ? chalk.yellow : chalk.red;
      console.log(paint(`\nSuccess Rate: ${rate.toFixed(1)}%`));
    }

    console.log(`\nEndpoints tested: ${endpointsTested}`);

    if (errors.length > 0) {
      console.log(chalk.red("\nErrors encountered:"));
      errors.slice(0, 5).forEach((entry) => {
        console.log(`  • ${entry.test}: ${formatError(entry.error).slice(0, 100)}`);
      });
    }

    console.log(chalk.cyan(RULE));
  }

  resources(resources: Record<string, string[]>): void {
    const kinds = Object.entries(resources).filter(([, ids]) => ids.length > 0);
    if (kinds.length === 0) return;

    console.log(chalk.cyan("\nResources Created in Sandbox:"));
    kinds.forEach(([kind, ids]) => {
      console.log(`  ${kind}: ${ids.join(", ")}`);
    });
  }

  availability(apis: ApiAvailability): void {
    console.log(chalk.cyan("\nAPI Availability:"));
    Object.entries(apis).forEach(([name, available]) => {
      const symbol = available ? "✅" : available === false ? "⚠️" : "❓";
      const text = available
        ? "Available"
        : available === false
          ? "Not Available"
          : "Unknown";
      console.log(`  ${symbol} ${titleCase(name)}: ${text}`);
    });
  }

  configuration(reports: EnvironmentReport[]): void {
    const table = new Table({
      head: ["Environment", "API Key", "Secret", "ISS", "Base URL"].map((title) =>
        chalk.blue.bold(title)
      ),
      style: { head: [], border: [] },
    });

    reports.forEach((report) => {
      table.push([
        titleCase(report.environment),
        report.apiKey ? chalk.green(report.apiKey) : chalk.red("missing"),
        report.hasSecret ? chalk.green("✓") : chalk.gray("-"),
        report.iss ?? chalk.gray("-"),
        report.baseUrl ?? chalk.gray("-"),
      ]);
    });
    console.log(table.toString());

    reports
      .filter((report) => report.error)
      .forEach((report) => console.log(chalk.yellow(`⚠ ${report.error}`)));
  }

  testCatalog(groups: Map<string, string[]>): void {
    console.log(chalk.cyan("\nAvailable Tests:"));
    console.log(chalk.cyan("=".repeat(40)));
    groups.forEach((names, category) => {
      console.log(chalk.yellow(`\n${category}:`));
      names.forEach((name) => console.log(`  • ${name}`));
    });
  }
}

export function formatError(error: unknown): string {
  if (typeof error === "string") return error;
  if (error instanceof Error) return error.message;
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}

/** "marketing_api" -> "Marketing Api" */
export function titleCase(name: string): string {
  return name
    .split("_")
    .map((word) => (word ? word[0].toUpperCase() + word.slice(1) : word))
    .join(" ");
}
