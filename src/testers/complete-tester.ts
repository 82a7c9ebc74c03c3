import type { JsonObject } from "../types";
import type { ApiAvailability } from "../cli/result-display";
import {
  BaseApiTester,
  type TestCase,
  asList,
  field,
  outcomeStatusCode,
} from "./base-tester";
import { buildArtistPayload } from "./payloads";

type ApiFamily = "marketing_api" | "publisher_api" | "conversion_api";

export type PublisherEvent = "play" | "like";

interface ProbeMessages {
  passed: string;
  unavailable: string;
  failed: string;
}

/**
 * Exercises the three API families. The publisher and conversion APIs live
 * at the root of the base URL and only accept POST, so in a read-only
 * environment they are skipped rather than probed.
 */
export class CompleteApiTester extends BaseApiTester {
  protected readonly resultsPrefix = "complete_api_test_results";
  private availability: Record<ApiFamily, boolean | null> = {
    marketing_api: null,
    publisher_api: null,
    conversion_api: null,
  };

  getAvailability(): ApiAvailability {
    return { ...this.availability };
  }

  // ========== MARKETING API ==========

  async testMarketingListArtists(): Promise<boolean> {
    this.display.testTitle("[MARKETING API] List Artists");
    const outcome = await this.client.request("/artists");

    return this.settle("marketing_list_artists", outcome, {
      pass: (response) => {
        if (Array.isArray(response.data)) {
          this.availability.marketing_api = true;
        }
        return { message: `Found ${asList(response.data).length} artists` };
      },
      fail: () => {
        this.availability.marketing_api = false;
        return { message: "Failed to list artists", status: "FAILED" };
      },
    });
  }

  async testMarketingSearchArtists(term: string = "test"): Promise<boolean> {
    this.display.testTitle(`[MARKETING API] Search Artists: '${term}'`);
    const outcome = await this.client.request("/artists/search", {
      query: { term },
    });

    return this.settle("marketing_search_artists", outcome, {
      pass: (response) => ({
        message: `Found ${asList(response.data).length} matching artists`,
      }),
      fail: () => ({ message: "Search failed or not available", status: "WARNING" }),
    });
  }

  async testMarketingListSmartlinks(): Promise<boolean> {
    this.display.testTitle("[MARKETING API] List SmartLinks");
    const outcome = await this.client.request("/smartlinks");

    return this.settle("marketing_list_smartlinks", outcome, {
      pass: (response) => ({
        message: `Found ${asList(response.data).length} smartlinks`,
      }),
      fail: (failed) =>
        outcomeStatusCode(failed) === 404
          ? {
              message: "SmartLinks list endpoint not available",
              status: "WARNING",
            }
          : { message: "Failed to list smartlinks", status: "FAILED" },
    });
  }

  async testMarketingCreateArtist(): Promise<string | null> {
    this.display.testTitle("[MARKETING API] Create Artist (WRITE)");
    if (!this.config.canWrite()) {
      this.skip("marketing_create_artist", "Write operations disabled");
      return null;
    }
    this.config.requireWritePermission("marketing_create_artist");

    let artistId: string | null = null;
    const outcome = await this.client.request("/artist", {
      method: "POST",
      body: buildArtistPayload(this.clock(), "API Test Artist"),
    });

    this.settle("marketing_create_artist", outcome, {
      pass: (response) => {
        artistId = field(response.data, "id") ?? null;
        if (artistId) {
          this.recorder.addResource("artists", artistId);
        }
        return { message: `Artist created: ${artistId ?? "N/A"}` };
      },
      fail: () => ({ message: "Failed to create artist", status: "FAILED" }),
    });
    return artistId;
  }

  // ========== PUBLISHER API ==========

  async testPublisherIdentifyConsumer(): Promise<boolean> {
    this.display.testTitle("[PUBLISHER API] Identify Consumer");
    const now = this.clock();
    return this.probe(
      "publisher_identify_consumer",
      "/consumer/identify",
      {
        consumerId: `test_consumer_${Math.floor(now.getTime() / 1000)}`,
        platform: "test",
        timestamp: now.toISOString(),
      },
      {
        passed: "Consumer identified successfully",
        unavailable: "Publisher API not available or requires different auth",
        failed: "Publisher API test failed",
      },
      "publisher_api"
    );
  }

  async testPublisherFeaturedSong(): Promise<boolean> {
    this.display.testTitle("[PUBLISHER API] Get Featured Song");
    return this.probe(
      "publisher_featured_song",
      "/featured/song",
      {},
      {
        passed: "Featured song retrieved",
        unavailable: "Featured song endpoint not available",
        failed: "Featured song test failed",
      }
    );
  }

  async testPublisherTrackEvent(eventType: PublisherEvent = "play"): Promise<boolean> {
    this.display.testTitle(`[PUBLISHER API] Track Event: ${eventType}`);
    const now = this.clock();
    const songPlayId = `test_play_${Math.floor(now.getTime() / 1000)}`;
    return this.probe(
      `publisher_track_${eventType}`,
      `/event/${songPlayId}/${eventType}`,
      { timestamp: now.toISOString(), platform: "test" },
      {
        passed: `Event '${eventType}' tracked successfully`,
        unavailable: "Event tracking not available",
        failed: "Event tracking failed",
      }
    );
  }

  // ========== CONVERSION API ==========

  async testConversionInitSession(): Promise<boolean> {
    this.display.testTitle("[CONVERSION API] Initialize Session");
    const now = this.clock();
    return this.probe(
      "conversion_init_session",
      "/conversion/session/init",
      {
        sessionId: `test_session_${Math.floor(now.getTime() / 1000)}`,
        timestamp: now.toISOString(),
        platform: "test",
      },
      {
        passed: "Conversion session initialized",
        unavailable: "Conversion API not available or requires different setup",
        failed: "Conversion API test failed",
      },
      "conversion_api"
    );
  }

  async testConversionReportTransaction(): Promise<boolean> {
    this.display.testTitle("[CONVERSION API] Report Transaction");
    const now = this.clock();
    return this.probe(
      "conversion_report_transaction",
      "/conversion/transaction",
      {
        transactionId: `test_txn_${Math.floor(now.getTime() / 1000)}`,
        amount: 9.99,
        currency: "USD",
        timestamp: now.toISOString(),
      },
      {
        passed: "Transaction reported successfully",
        unavailable: "Transaction reporting not available",
        failed: "Transaction reporting failed",
      }
    );
  }

  /**
   * Single-attempt POST against the root base URL. Anything short of a
   * success is a WARNING: these APIs are optional for a marketing key.
   */
  private async probe(
    testName: string,
    endpoint: string,
    body: JsonObject,
    messages: ProbeMessages,
    family?: ApiFamily
  ): Promise<boolean> {
    if (!this.config.canWrite()) {
      return this.skip(testName, "Write operations disabled");
    }

    const outcome = await this.client.request(endpoint, {
      method: "POST",
      body,
      baseOverride: this.config.baseUrl,
      retryCount: 1,
    });

    return this.settle(testName, outcome, {
      pass: (response) => {
        if (family) this.availability[family] = true;
        const title = field(response.data, "title");
        return {
          message: messages.passed,
          notes: title ? [`Song: ${title}`] : [],
        };
      },
      fail: (failed) => {
        if (family) this.availability[family] = false;
        return "response" in failed
          ? { message: messages.unavailable, status: "WARNING" }
          : { message: `${messages.failed}: ${failed.failure.error}`, status: "WARNING" };
      },
    });
  }

  // ========== RUNNERS ==========

  catalog(): TestCase[] {
    return [
      ...this.authCases(),
      {
        name: "marketing_list_artists",
        category: "Marketing API",
        description: "GET /artists",
        run: () => this.testMarketingListArtists(),
      },
      {
        name: "marketing_search_artists",
        category: "Marketing API",
        description: "GET /artists/search",
        run: () => this.testMarketingSearchArtists(),
      },
      {
        name: "marketing_list_smartlinks",
        category: "Marketing API",
        description: "GET /smartlinks",
        run: () => this.testMarketingListSmartlinks(),
      },
      {
        name: "marketing_create_artist",
        category: "Marketing API",
        description: "POST /artist",
        run: () => this.testMarketingCreateArtist(),
      },
      {
        name: "publisher_identify_consumer",
        category: "Publisher API",
        description: "POST /consumer/identify",
        run: () => this.testPublisherIdentifyConsumer(),
      },
      {
        name: "publisher_featured_song",
        category: "Publisher API",
        description: "POST /featured/song",
        run: () => this.testPublisherFeaturedSong(),
      },
      {
        name: "publisher_track_play",
        category: "Publisher API",
        description: "POST /event/:songPlayId/play",
        run: () => this.testPublisherTrackEvent("play"),
      },
      {
        name: "publisher_track_like",
        category: "Publisher API",
        description: "POST /event/:songPlayId/like",
        run: () => this.testPublisherTrackEvent("like"),
      },
      {
        name: "conversion_init_session",
        category: "Conversion API",
        description: "POST /conversion/session/init",
        run: () => this.testConversionInitSession(),
      },
      {
        name: "conversion_report_transaction",
        category: "Conversion API",
        description: "POST /conversion/transaction",
        run: () => this.testConversionReportTransaction(),
      },
    ];
  }

  async runAllTests(): Promise<boolean> {
    this.display.runHeader([
      "Feature.fm Complete API Test Suite",
      "Testing: Marketing API, Publisher API, Conversion API",
      `Environment: ${this.config.getEnvName()}`,
      `Write operations: ${this.config.canWrite() ? "ENABLED" : "DISABLED"}`,
    ]);

    this.display.header("Authentication Tests");
    await this.testBasicAuth();
    await this.testJwtAuth();

    this.display.header("Marketing API Tests");
    await this.testMarketingListArtists();
    await this.testMarketingSearchArtists();
    await this.testMarketingListSmartlinks();
    await this.testMarketingCreateArtist();

    this.display.header("Publisher API Tests");
    await this.testPublisherIdentifyConsumer();
    await this.testPublisherFeaturedSong();
    await this.testPublisherTrackEvent("play");
    await this.testPublisherTrackEvent("like");

    this.display.header("Conversion API Tests");
    await this.testConversionInitSession();
    await this.testConversionReportTransaction();

    this.display.header("API Availability Summary");
    this.display.availability(this.getAvailability());

    return this.finish();
  }
}
