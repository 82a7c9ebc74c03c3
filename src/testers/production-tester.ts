import type { ApiConfig } from "../config/api-config";
import { ConfigurationError, WritePermissionError } from "../config/errors";
import {
  BaseApiTester,
  type TestCase,
  type TesterOptions,
  asList,
  failureMessage,
} from "./base-tester";

export interface ProductionTesterOptions extends TesterOptions {
  /** Artist used by get_artist_details; the test is skipped without one. */
  sampleArtistId?: string;
  sampleSmartlinkId?: string;
}

/**
 * Read-only suite for the live API. Responses are summarised by count only
 * so no production data ends up in the console.
 */
export class ProductionApiTester extends BaseApiTester {
  protected readonly resultsPrefix = "production_test_results";
  private sampleArtistId?: string;
  private sampleSmartlinkId?: string;

  constructor(config: ApiConfig, options: ProductionTesterOptions = {}) {
    if (config.environment !== "production") {
      throw new ConfigurationError(
        "ProductionApiTester can only be used with the production environment",
        { environment: config.environment }
      );
    }
    if (config.canWrite()) {
      throw new WritePermissionError(
        "CRITICAL SAFETY ERROR: Write operations must be disabled for the production environment",
        { environment: config.environment }
      );
    }
    super(config, options);
    this.sampleArtistId = options.sampleArtistId;
    this.sampleSmartlinkId = options.sampleSmartlinkId;
  }

  // ========== READ-ONLY OPERATIONS ==========

  async testListArtists(): Promise<boolean> {
    this.display.testTitle("List Artists (READ-ONLY)");
    const outcome = await this.client.request("/artists");

    return this.settle("list_artists", outcome, {
      pass: (response) => {
        const count = asList(response.data).length;
        return {
          message: `Found ${count} production artists`,
          notes: [`Total count: ${count}`],
        };
      },
      fail: (failed) => ({
        message: `Failed to list artists: ${failureMessage(failed)}`,
        status: "FAILED",
      }),
    });
  }

  async testSearchArtists(term: string = "test"): Promise<boolean> {
    this.display.testTitle(`Search Artists: '${term}' (READ-ONLY)`);
    const outcome = await this.client.request("/artists/search", {
      query: { term },
    });

    return this.settle("search_artists", outcome, {
      pass: (response) => ({
        message: `Found ${asList(response.data).length} matching artists`,
      }),
      fail: () => ({ message: "Search failed or not available", status: "WARNING" }),
    });
  }

  async testGetArtistDetails(artistId: string | undefined = this.sampleArtistId): Promise<boolean> {
    this.display.testTitle("Get Artist Details (READ-ONLY)");
    if (!artistId) {
      return this.skip("get_artist_details", "No artist ID");
    }

    const outcome = await this.client.request(`/artist/${encodeURIComponent(artistId)}`);
    return this.settle("get_artist_details", outcome, {
      pass: () => ({ message: "Retrieved artist data successfully" }),
      fail: () => ({ message: "Failed to get artist details", status: "FAILED" }),
    });
  }

  async testListActionPages(): Promise<boolean> {
    this.display.testTitle("List Action Pages (READ-ONLY)");
    const outcome = await this.client.request("/actionpages");

    return this.settle("list_actionpages", outcome, {
      pass: (response) => ({
        message: `Found ${asList(response.data).length} action pages`,
      }),
      fail: () => ({ message: "Failed to list action pages", status: "WARNING" }),
    });
  }

  async testSearchActionPages(term: string = ""): Promise<boolean> {
    this.display.testTitle("Search Action Pages (READ-ONLY)");
    const outcome = await this.client.request("/actionpages/search", {
      query: { term },
    });

    return this.settle("search_actionpages", outcome, {
      pass: (response) => ({
        message: `Found ${asList(response.data).length} matching action pages`,
      }),
      fail: () => ({ message: "Search failed or not available", status: "WARNING" }),
    });
  }

  async testGetSmartlink(
    smartlinkId: string | undefined = this.sampleSmartlinkId
  ): Promise<boolean> {
    this.display.testTitle("Get SmartLink Details (READ-ONLY)");
    if (!smartlinkId) {
      return this.skip("get_smartlink", "No smart link ID");
    }

    const outcome = await this.client.request(`/smartlink/${encodeURIComponent(smartlinkId)}`);
    return this.settle("get_smartlink", outcome, {
      pass: () => ({ message: "SmartLink data retrieved successfully" }),
      fail: () => ({ message: "Failed to get SmartLink details", status: "FAILED" }),
    });
  }

  // ========== BLOCKED WRITES ==========

  createArtist(): never {
    return this.blockWrite("create_artist");
  }

  createSmartlink(_artistId: string): never {
    return this.blockWrite("create_smartlink");
  }

  createPresave(_artistId: string): never {
    return this.blockWrite("create_presave");
  }

  updateArtist(_artistId: string, _changes: object): never {
    return this.blockWrite("update_artist");
  }

  deleteResource(_resourceId: string): never {
    return this.blockWrite("delete_resource");
  }

  private blockWrite(operation: string): never {
    const message =
      `BLOCKED: Attempted to execute write operation '${operation}' in the ` +
      "PRODUCTION environment. Write operations are strictly prohibited.";
    this.display.status(message, "FAILED", 1);
    throw new WritePermissionError(message, {
      environment: this.config.environment,
      operation,
    });
  }

  // ========== RUNNERS ==========

  catalog(): TestCase[] {
    return [
      ...this.authCases(),
      {
        name: "list_artists",
        category: "Artist Management",
        description: "GET /artists",
        run: () => this.testListArtists(),
      },
      {
        name: "search_artists",
        category: "Artist Management",
        description: "GET /artists/search",
        run: () => this.testSearchArtists(),
      },
      {
        name: "get_artist_details",
        category: "Artist Management",
        description: "GET /artist/:id",
        run: () => this.testGetArtistDetails(),
      },
      {
        name: "list_actionpages",
        category: "Action Pages",
        description: "GET /actionpages",
        run: () => this.testListActionPages(),
      },
      {
        name: "search_actionpages",
        category: "Action Pages",
        description: "GET /actionpages/search",
        run: () => this.testSearchActionPages(),
      },
      {
        name: "get_smartlink",
        category: "Smart Links",
        description: "GET /smartlink/:id",
        run: () => this.testGetSmartlink(),
      },
    ];
  }

  async runAllTests(sampleArtistId: string | undefined = this.sampleArtistId): Promise<boolean> {
    this.display.runHeader(
      [
        "PRODUCTION ENVIRONMENT - READ-ONLY MODE",
        "Write operations: DISABLED",
        "Safety: All write attempts will be blocked",
      ],
      "danger"
    );

    this.display.header("Authentication Tests");
    const authenticated = await this.testBasicAuth();
    if (!authenticated) {
      this.display.error("\nAuthentication failed. Stopping tests.");
      await this.finish();
      return false;
    }
    await this.testJwtAuth();

    this.display.header("Read Operations - Artists");
    await this.testListArtists();
    await this.testSearchArtists("test");
    if (sampleArtistId) {
      await this.testGetArtistDetails(sampleArtistId);
    }

    this.display.header("Read Operations - Action Pages");
    await this.testListActionPages();
    await this.testSearchActionPages();

    if (this.sampleSmartlinkId) {
      this.display.header("Read Operations - Smart Links");
      await this.testGetSmartlink(this.sampleSmartlinkId);
    }

    const passed = await this.finish();
    this.display.success("\n✓ All production tests completed safely (read-only)");
    return passed;
  }
}
