import { Command, CommanderError } from "commander";
import chalk from "chalk";
import { isEnvironment, type Environment } from "../types";
import {
  ApiConfig,
  DEFAULT_BASE_URL,
  DEFAULT_RETRY_COUNT,
  DEFAULT_TIMEOUT_MS,
  describeConfiguration,
  loadConfig,
  type ConfigOverrides,
  type EnvSource,
} from "../config/api-config";
import { ConfigurationError, WritePermissionError } from "../config/errors";
import type { BaseApiTester, TesterOptions } from "../testers/base-tester";
import { SandboxApiTester } from "../testers/sandbox-tester";
import { ProductionApiTester } from "../testers/production-tester";
import { CompleteApiTester } from "../testers/complete-tester";
import { ResultDisplayManager } from "./result-display";
import { InquirerPrompter, type Prompter } from "./prompter";
import {
  confirmProduction,
  promptEnvironment,
  promptSampleArtistId,
} from "./confirmation";

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INTERRUPTED = 130;

export type GlobalOptions = {
  apiKey?: string;
  secretKey?: string;
  iss?: string;
  baseUrl?: string;
  outputDir?: string;
  quiet?: boolean;
};

interface EnvOption {
  env?: string;
}

interface ProductionOptions {
  artistId?: string;
  smartlinkId?: string;
}

export interface CLIRunnerDependencies {
  prompter?: Prompter;
  /** Replaces process.env (and the .env file) as the configuration source. */
  env?: EnvSource;
  testerOptions?: Pick<TesterOptions, "clientOptions" | "clock">;
}

export class CLIRunner {
  private program: Command;
  private prompter: Prompter;
  private deps: CLIRunnerDependencies;
  private exitCode: number = EXIT_SUCCESS;

  constructor(deps: CLIRunnerDependencies = {}) {
    this.deps = deps;
    this.prompter = deps.prompter ?? new InquirerPrompter();
    this.program = new Command();
    this.setupCommands();
  }

  private setupCommands(): void {
    this.program
      .name("ffm-api-test")
      .description("Feature.fm API test harness for sandbox and production")
      .version("2.0.0")
      .option("--api-key <key>", "API key (overrides FEATUREFM_*_API_KEY)")
      .option("--secret-key <key>", "Secret key used for JWT and HMAC auth")
      .option("--iss <issuer>", "JWT issuer claim")
      .option("--base-url <url>", "API base URL")
      .option("--output-dir <dir>", "Directory for JSON result files")
      .option("-q, --quiet", "Only print summaries and errors", false)
      .exitOverride();

    this.program
      .command("sandbox")
      .description("Run the full sandbox suite, including write operations")
      .action(() => this.guard(() => this.runSandbox()));

    this.program
      .command("production")
      .description("Run the read-only production suite")
      .option("--artist-id <id>", "Artist ID for the detail retrieval test")
      .option("--smartlink-id <id>", "Smart link ID for the detail retrieval test")
      .action((options: ProductionOptions) =>
        this.guard(() => this.runProduction(options))
      );

    this.program
      .command("all")
      .description("Probe the marketing, publisher and conversion APIs")
      .option("-e, --env <environment>", "sandbox or production")
      .action((options: EnvOption) => this.guard(() => this.runComplete(options)));

    this.program
      .command("run <test>")
      .description("Run a single named test")
      .option("-e, --env <environment>", "sandbox or production", "sandbox")
      .action((testName: string, options: EnvOption) =>
        this.guard(() => this.runSingle(testName, options))
      );

    this.program
      .command("list-tests")
      .description("List the tests available for an environment")
      .option("-e, --env <environment>", "sandbox or production", "sandbox")
      .action((options: EnvOption) => this.guard(async () => this.listTests(options)));

    this.program
      .command("verify")
      .description("Check which environments are configured")
      .action(() => this.guard(async () => this.verify()));
  }

  async run(args: string[] = process.argv.slice(2)): Promise<number> {
    this.exitCode = EXIT_SUCCESS;
    try {
      await this.program.parseAsync(args, { from: "user" });
    } catch (error) {
      if (error instanceof CommanderError) {
        return error.exitCode;
      }
      throw error;
    }
    return this.exitCode;
  }

  // ========== COMMANDS ==========

  private async runSandbox(): Promise<number> {
    const config = this.loadConfig("sandbox");
    const display = this.display();
    display.banner([
      "Feature.fm API Sandbox Test Suite",
      "",
      `Environment: ${config.getEnvName()}`,
      `API Key: ${config.maskedApiKey()}`,
      `Write Operations: ${config.canWrite() ? "ENABLED" : "DISABLED"}`,
    ]);

    const tester = new SandboxApiTester(config, this.testerOptions(display));
    return (await tester.runAllTests()) ? EXIT_SUCCESS : EXIT_FAILURE;
  }

  private async runProduction(options: ProductionOptions): Promise<number> {
    const config = this.loadConfig("production");
    if (!(await this.passProductionGate(config))) {
      return EXIT_SUCCESS;
    }

    const sampleArtistId =
      options.artistId ?? (await promptSampleArtistId(this.prompter));
    const tester = new ProductionApiTester(config, {
      ...this.testerOptions(this.display()),
      sampleArtistId,
      sampleSmartlinkId: options.smartlinkId,
    });
    return (await tester.runAllTests(sampleArtistId)) ? EXIT_SUCCESS : EXIT_FAILURE;
  }

  private async runComplete(options: EnvOption): Promise<number> {
    const environment = options.env
      ? parseEnvironment(options.env)
      : await promptEnvironment(this.prompter);
    const config = this.loadConfig(environment);

    if (environment === "production") {
      if (!(await this.passProductionGate(config))) {
        return EXIT_SUCCESS;
      }
    } else {
      this.display().banner([
        "Feature.fm Complete API Test Suite",
        "",
        `Environment: ${environment.toUpperCase()}`,
        `Write Ops: ${config.canWrite() ? "ENABLED" : "DISABLED"}`,
      ]);
    }

    const tester = new CompleteApiTester(config, this.testerOptions(this.display()));
    return (await tester.runAllTests()) ? EXIT_SUCCESS : EXIT_FAILURE;
  }

  private async runSingle(testName: string, options: EnvOption): Promise<number> {
    const environment = parseEnvironment(options.env ?? "sandbox");
    const config = this.loadConfig(environment);
    if (environment === "production" && !(await this.passProductionGate(config))) {
      return EXIT_SUCCESS;
    }

    const tester = this.createTester(config);
    return (await tester.runSpecificTest(testName)) ? EXIT_SUCCESS : EXIT_FAILURE;
  }

  private listTests(options: EnvOption): number {
    const environment = parseEnvironment(options.env ?? "sandbox");
    // Listing never sends a request, so credentials are not required.
    const config = new ApiConfig({
      environment,
      apiKey: "catalog-only",
      baseUrl: DEFAULT_BASE_URL,
      timeoutMs: DEFAULT_TIMEOUT_MS,
      retryCount: DEFAULT_RETRY_COUNT,
    });
    const display = this.display();
    display.testCatalog(this.createTester(config).listTests());
    return EXIT_SUCCESS;
  }

  private verify(): number {
    const display = this.display();
    const reports = describeConfiguration(this.deps.env);
    display.info(chalk.cyan("\nVerifying Feature.fm API configuration..."));
    display.configuration(reports);

    if (reports.some((report) => report.configured)) {
      display.success("\n✓ Configuration verified! Ready to run Feature.fm API tests");
      return EXIT_SUCCESS;
    }
    display.error("\n✗ No environment is configured. Copy .env.example to .env and add your keys.");
    return EXIT_FAILURE;
  }

  // ========== HELPERS ==========

  private async passProductionGate(config: ApiConfig): Promise<boolean> {
    const display = this.display();
    if (config.canWrite()) {
      throw new WritePermissionError(
        "Production configuration allows writes! This should never happen.",
        { environment: config.environment }
      );
    }

    display.banner(
      [
        "Feature.fm API Production Test Suite (READ-ONLY)",
        "",
        "⚠️  PRODUCTION ENVIRONMENT - EXTREME CAUTION  ⚠️",
        "",
        "Write Operations: DISABLED",
        "Delete Operations: DISABLED",
        "Update Operations: DISABLED",
        "",
        "Only read operations will be executed",
      ],
      "danger"
    );

    if (await confirmProduction(this.prompter)) {
      return true;
    }
    display.warn("Tests cancelled by user.");
    return false;
  }

  private createTester(config: ApiConfig): BaseApiTester {
    const options = this.testerOptions(this.display());
    return config.environment === "production"
      ? new ProductionApiTester(config, options)
      : new SandboxApiTester(config, options);
  }

  private loadConfig(environment: Environment): ApiConfig {
    const options = this.program.opts<GlobalOptions>();
    const overrides: ConfigOverrides = {
      apiKey: options.apiKey,
      secretKey: options.secretKey,
      iss: options.iss,
      baseUrl: options.baseUrl,
    };
    return this.deps.env
      ? loadConfig(environment, overrides, this.deps.env)
      : loadConfig(environment, overrides);
  }

  private display(): ResultDisplayManager {
    return new ResultDisplayManager({ verbose: !this.program.opts<GlobalOptions>().quiet });
  }

  private testerOptions(display: ResultDisplayManager): TesterOptions {
    return {
      ...this.deps.testerOptions,
      display,
      outputDir: this.program.opts<GlobalOptions>().outputDir,
    };
  }

  /** Runs a command and turns whatever it throws into an exit code. */
  private async guard(command: () => Promise<number>): Promise<void> {
    try {
      this.exitCode = await command();
    } catch (error) {
      this.exitCode = this.reportError(error);
    }
  }

  private reportError(error: unknown): number {
    if (error instanceof WritePermissionError) {
      const label =
        error.context.environment === "production"
          ? "CRITICAL SAFETY ERROR"
          : "Permission Error";
      console.error(chalk.red(`${label}: ${error.message}`));
      return EXIT_FAILURE;
    }
    if (error instanceof ConfigurationError) {
      console.error(chalk.red(`Configuration Error: ${error.message}`));
      return EXIT_FAILURE;
    }

    const message = error instanceof Error ? error.message : String(error);
    console.error(chalk.red(`Unexpected Error: ${message}`));
    if (error instanceof Error && error.stack && !this.program.opts<GlobalOptions>().quiet) {
      console.error(chalk.gray(error.stack));
    }
    return EXIT_FAILURE;
  }
}

function parseEnvironment(value: string): Environment {
  const normalized = value.trim().toLowerCase();
  if (!isEnvironment(normalized)) {
    throw new ConfigurationError(
      `Unknown environment '${value}'. Use sandbox or production.`
    );
  }
  return normalized;
}

export async function startCLI(args?: string[]): Promise<number> {
  const runner = new CLIRunner();
  return runner.run(args);
}
