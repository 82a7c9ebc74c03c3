import type { ApiConfig } from "../config/api-config";
import { ConfigurationError } from "../config/errors";
import {
  BaseApiTester,
  type TestCase,
  type TesterOptions,
  asList,
  field,
  failureMessage,
  outcomeStatusCode,
} from "./base-tester";
import {
  addDays,
  buildActionPagePayload,
  buildArtistPayload,
  buildPreSavePayload,
  buildReleasePayload,
  buildSmartLinkPayload,
  buildWebhookPayload,
  isoDay,
} from "./payloads";

interface SandboxTestData {
  artistId?: string;
  artistName?: string;
  createdArtistId?: string;
  smartlinkId?: string;
  smartlinkUrl?: string;
  campaignId?: string;
  actionPageId?: string;
  releaseId?: string;
  webhookId?: string;
}

/**
 * Full read and write suite. Only accepts a sandbox configuration, and every
 * write still asks the configuration for permission before it is sent.
 */
export class SandboxApiTester extends BaseApiTester {
  protected readonly resultsPrefix = "sandbox_test_results";
  private testData: SandboxTestData = {};

  constructor(config: ApiConfig, options: TesterOptions = {}) {
    if (config.environment !== "sandbox") {
      throw new ConfigurationError(
        "SandboxApiTester can only be used with the sandbox environment",
        { environment: config.environment }
      );
    }
    super(config, options);
  }

  getTestData(): SandboxTestData {
    return { ...this.testData };
  }

  // ========== ARTISTS ==========

  async testListArtists(): Promise<boolean> {
    this.display.testTitle("List Artists");
    const outcome = await this.client.request("/artists");

    return this.settle("list_artists", outcome, {
      pass: (response) => {
        if (!this.matchesShape("artistList", response.data)) {
          return {
            message: "No artists found or unexpected format",
            status: "WARNING",
          };
        }
        const artists = asList(response.data);
        const first = artists[0];
        if (first !== undefined && !this.testData.artistId) {
          this.testData.artistId = field(first, "id");
          this.testData.artistName = field(first, "artistName");
        }
        return {
          message: `Found ${artists.length} artists`,
          notes: artists
            .slice(0, 3)
            .map(
              (artist) =>
                `Artist: ${field(artist, "artistName") ?? "Unknown"} (ID: ${field(artist, "id")})`
            ),
        };
      },
      fail: (failed) => ({
        message: `Failed to list artists: ${failureMessage(failed)}`,
        status: "FAILED",
      }),
    });
  }

  async testCreateArtist(): Promise<boolean> {
    this.display.testTitle("Create Artist (WRITE OPERATION)");
    this.config.requireWritePermission("create_artist");

    const payload = buildArtistPayload(this.clock());
    const outcome = await this.client.request("/artist", {
      method: "POST",
      body: payload,
    });

    return this.settle("create_artist", outcome, {
      pass: (response) => {
        const artistId = field(response.data, "id");
        if (!artistId) {
          return {
            message: "Artist created but no ID was returned",
            status: "WARNING",
          };
        }
        const artistName = field(response.data, "artistName") ?? payload.artistName;
        this.testData.artistId = artistId;
        this.testData.artistName = artistName;
        this.testData.createdArtistId = artistId;
        this.recorder.addResource("artists", artistId);
        return { message: `Artist created: ${artistName} (ID: ${artistId})` };
      },
      fail: (failed) =>
        outcomeStatusCode(failed) === 403
          ? { message: "Create artist not permitted", status: "WARNING" }
          : {
              message: `Failed to create artist: ${failureMessage(failed)}`,
              status: "FAILED",
            },
    });
  }

  async testGetArtistDetails(): Promise<boolean> {
    this.display.testTitle("Get Artist Details");
    const artistId = this.testData.artistId;
    if (!artistId) {
      return this.skip("get_artist_details", "No artist ID");
    }

    const outcome = await this.client.request(`/artist/${encodeURIComponent(artistId)}`);
    return this.settle("get_artist_details", outcome, {
      pass: (response) => {
        if (!this.matchesShape("artist", response.data)) {
          return { message: "Unexpected artist format", status: "WARNING" };
        }
        return {
          message: `Retrieved artist: ${field(response.data, "artistName") ?? "Unknown"}`,
          notes: [
            `Type: ${field(response.data, "type") ?? "N/A"}`,
            `Country: ${field(response.data, "countryCode") ?? "N/A"}`,
          ],
        };
      },
      fail: () => ({ message: "Failed to get artist details", status: "FAILED" }),
    });
  }

  async testUpdateArtist(): Promise<boolean> {
    this.display.testTitle("Update Artist (WRITE OPERATION)");
    const artistId = this.testData.createdArtistId;
    if (!artistId) {
      return this.skip("update_artist", "No artist created in this run");
    }
    this.config.requireWritePermission("update_artist");

    const outcome = await this.client.request(`/artist/${encodeURIComponent(artistId)}`, {
      method: "PUT",
      body: { shortBio: `Updated by sandbox test suite at ${this.clock().toISOString()}` },
    });

    return this.settle("update_artist", outcome, {
      pass: () => ({ message: `Artist ${artistId} updated` }),
      fail: (failed) =>
        [403, 404, 405].includes(outcomeStatusCode(failed))
          ? { message: "Artist updates not supported", status: "WARNING" }
          : {
              message: `Failed to update artist: ${failureMessage(failed)}`,
              status: "FAILED",
            },
    });
  }

  // ========== SMART LINKS ==========

  async testListSmartlinks(): Promise<boolean> {
    this.display.testTitle("List Smart Links");
    const outcome = await this.client.request("/smartlinks", {
      query: { limit: 10, offset: 0 },
    });

    return this.settle("list_smartlinks", outcome, {
      pass: (response) => {
        if (!this.matchesShape("resourceList", response.data)) {
          return {
            message: "Unexpected smart link list format",
            status: "WARNING",
          };
        }
        const links = asList(response.data);
        const first = links[0];
        if (first !== undefined && !this.testData.smartlinkId) {
          this.testData.smartlinkId = field(first, "id");
          this.testData.smartlinkUrl = field(first, "shortUrl") ?? field(first, "url");
        }
        return {
          message: `Found ${links.length} smart links`,
          notes: links
            .slice(0, 3)
            .map(
              (link) =>
                `Link: ${field(link, "title") ?? "Untitled"} - ${field(link, "shortUrl") ?? field(link, "url") ?? "N/A"}`
            ),
        };
      },
      fail: (failed) =>
        outcomeStatusCode(failed) === 404
          ? {
              message: "SmartLinks list endpoint not available",
              status: "WARNING",
            }
          : { message: "Failed to list smart links", status: "FAILED" },
    });
  }

  async testCreateSmartlink(): Promise<boolean> {
    this.display.testTitle("Create Smart Link (WRITE OPERATION)");
    const artistId = this.testData.artistId;
    if (!artistId) {
      return this.skip("create_smartlink", "No artist ID");
    }
    this.config.requireWritePermission("create_smartlink");

    const outcome = await this.client.request("/smartlink", {
      method: "POST",
      body: buildSmartLinkPayload(artistId, this.clock()),
    });

    return this.settle("create_smartlink", outcome, {
      pass: (response) => {
        const linkId = field(response.data, "id");
        const shortUrl = field(response.data, "shortUrl") ?? field(response.data, "url");
        if (linkId) {
          this.testData.smartlinkId = linkId;
          this.testData.smartlinkUrl = shortUrl;
          this.recorder.addResource("smartlinks", linkId);
        }
        return {
          message: "Smart link created successfully",
          notes: [`ID: ${linkId ?? "N/A"}`, `URL: ${shortUrl ?? "N/A"}`],
        };
      },
      fail: () => ({ message: "Failed to create smart link", status: "FAILED" }),
    });
  }

  async testSmartlinkAnalytics(): Promise<boolean> {
    this.display.testTitle("Smart Link Analytics");
    const linkId = this.testData.smartlinkId;
    if (!linkId) {
      return this.skip("smartlink_analytics", "No smart link ID");
    }

    const segment = encodeURIComponent(linkId);
    const candidates = [
      `/smartlink/${segment}/analytics`,
      `/analytics/smartlink/${segment}`,
      `/smartlink/${segment}/stats`,
    ];

    let outcome = await this.client.request(candidates[0]);
    for (const endpoint of candidates.slice(1)) {
      if (outcome.success) break;
      outcome = await this.client.request(endpoint);
    }

    return this.settle("smartlink_analytics", outcome, {
      pass: (response) => ({
        message: "Analytics retrieved successfully",
        notes: [
          `Total clicks: ${field(response.data, "totalClicks") ?? 0}`,
          `Unique visitors: ${field(response.data, "uniqueVisitors") ?? 0}`,
        ],
      }),
      fail: () => ({
        message: "Analytics not available (may be normal for new links)",
        status: "WARNING",
      }),
    });
  }

  // ========== CAMPAIGNS ==========

  async testCreatePresave(): Promise<boolean> {
    this.display.testTitle("Create Pre-Save Campaign (WRITE OPERATION)");
    const artistId = this.testData.artistId;
    if (!artistId) {
      return this.skip("create_presave", "No artist ID");
    }
    this.config.requireWritePermission("create_presave");

    const payload = buildPreSavePayload(artistId, this.clock());
    const outcome = await this.client.request("/smartlink/pre-save", {
      method: "POST",
      body: payload,
    });

    return this.settle("create_presave", outcome, {
      pass: (response) => {
        const campaignId = field(response.data, "id");
        if (campaignId) {
          this.testData.campaignId = campaignId;
          this.recorder.addResource("campaigns", campaignId);
        }
        return {
          message: "Pre-save campaign created",
          notes: [`ID: ${campaignId ?? "N/A"}`, `Release date: ${payload.releaseDate}`],
        };
      },
      fail: (failed) => {
        const message =
          "response" in failed ? field(failed.response.data, "message") ?? "" : "";
        if (message.includes("scraping failed")) {
          return {
            message: "Pre-save validation failed (expected with test data)",
            status: "WARNING",
          };
        }
        if (outcomeStatusCode(failed) === 404) {
          return { message: "Pre-save campaigns not available", status: "WARNING" };
        }
        return { message: "Failed to create pre-save campaign", status: "FAILED" };
      },
    });
  }

  async testListCampaigns(): Promise<boolean> {
    this.display.testTitle("List Campaigns");
    const outcome = await this.client.request("/campaigns");

    return this.settle("list_campaigns", outcome, {
      pass: (response) => {
        const campaigns = asList(response.data);
        return {
          message: `Found ${campaigns.length} campaigns`,
          notes: campaigns
            .slice(0, 3)
            .map(
              (campaign) =>
                `Campaign: ${field(campaign, "title") ?? "Untitled"} (${field(campaign, "type") ?? "unknown"})`
            ),
        };
      },
      fail: () => ({
        message: "Failed to list campaigns or not available",
        status: "WARNING",
      }),
    });
  }

  // ========== ACTION PAGES ==========

  async testListActionPages(): Promise<boolean> {
    this.display.testTitle("List Action Pages");
    const outcome = await this.client.request("/actionpages");

    return this.settle("list_actionpages", outcome, {
      pass: (response) => ({
        message: `Found ${asList(response.data).length} action pages`,
      }),
      fail: () => ({ message: "Failed to list action pages", status: "WARNING" }),
    });
  }

  async testCreateActionPage(): Promise<boolean> {
    this.display.testTitle("Create Action Page (WRITE OPERATION)");
    this.config.requireWritePermission("create_actionpage");

    const outcome = await this.client.request("/actionpage", {
      method: "POST",
      body: buildActionPagePayload(
        this.testData.artistName ?? "Test Artist",
        this.testData.artistId
      ),
    });

    return this.settle("create_actionpage", outcome, {
      pass: (response) => {
        const pageId = field(response.data, "id");
        if (pageId) {
          this.testData.actionPageId = pageId;
          this.recorder.addResource("actionpages", pageId);
        }
        return {
          message: "Action page created",
          notes: [`URL: ${field(response.data, "url") ?? field(response.data, "publicUrl") ?? "N/A"}`],
        };
      },
      fail: (failed) =>
        [403, 404].includes(outcomeStatusCode(failed))
          ? { message: "Action pages require special permissions", status: "WARNING" }
          : { message: "Failed to create action page", status: "FAILED" },
    });
  }

  // ========== RELEASES / WEBHOOKS ==========

  async testCreateRelease(): Promise<boolean> {
    this.display.testTitle("Create Release (WRITE OPERATION)");
    this.config.requireWritePermission("create_release");

    const payload = buildReleasePayload(
      this.testData.artistName ?? "Test Artist",
      this.clock(),
      this.testData.artistId
    );
    const outcome = await this.client.request("/releases", {
      method: "POST",
      body: payload,
    });

    return this.settle("create_release", outcome, {
      pass: (response) => {
        const releaseId = field(response.data, "id");
        if (releaseId) {
          this.testData.releaseId = releaseId;
          this.recorder.addResource("releases", releaseId);
        }
        return {
          message: `Release created: ${payload.title}`,
          notes: [`ID: ${releaseId ?? "N/A"}`, `Type: ${payload.type}`],
        };
      },
      fail: () => ({ message: "Failed to create release", status: "WARNING" }),
    });
  }

  async testCreateWebhook(): Promise<boolean> {
    this.display.testTitle("Create Webhook (WRITE OPERATION)");
    this.config.requireWritePermission("create_webhook");

    const payload = buildWebhookPayload();
    const outcome = await this.client.request("/webhooks", {
      method: "POST",
      body: payload,
    });

    return this.settle("create_webhook", outcome, {
      pass: (response) => {
        const webhookId = field(response.data, "id");
        if (webhookId) {
          this.testData.webhookId = webhookId;
          this.recorder.addResource("webhooks", webhookId);
        }
        return {
          message: "Webhook created",
          notes: [
            `ID: ${webhookId ?? "N/A"}`,
            `Events: ${payload.events.slice(0, 2).join(", ")}...`,
          ],
        };
      },
      fail: () => ({
        message: "Webhooks not available or require special access",
        status: "WARNING",
      }),
    });
  }

  // ========== ANALYTICS / PARTNERS ==========

  async testOverviewAnalytics(): Promise<boolean> {
    this.display.testTitle("Overview Analytics");
    const now = this.clock();
    const outcome = await this.client.request("/analytics/overview", {
      query: { from: isoDay(addDays(now, -30)), to: isoDay(now) },
    });

    return this.settle("overview_analytics", outcome, {
      pass: (response) => ({
        message: "Overview analytics retrieved",
        notes: [
          `Total clicks: ${field(response.data, "totalClicks") ?? 0}`,
          `Total conversions: ${field(response.data, "totalConversions") ?? 0}`,
        ],
      }),
      fail: () => ({ message: "Overview analytics not available", status: "WARNING" }),
    });
  }

  async testPartnersPromoted(): Promise<boolean> {
    this.display.testTitle("Partners API - Promoted Content");
    const candidates = ["/v2/promoted", "/partners/promoted", "/promoted/songs"];

    let outcome = await this.client.request(candidates[0]);
    for (const endpoint of candidates.slice(1)) {
      // Only a 404 means "try the next path"; any other answer is final.
      if (outcome.success || outcomeStatusCode(outcome) !== 404) break;
      outcome = await this.client.request(endpoint);
    }

    return this.settle("partners_api", outcome, {
      pass: (response) => ({
        message: "Partners API accessible",
        notes: [`Found ${asList(response.data).length} promoted items`],
      }),
      fail: () => ({
        message: "Partners API requires special access",
        status: "WARNING",
      }),
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
        name: "create_artist",
        category: "Artist Management",
        description: "POST /artist",
        run: () => this.testCreateArtist(),
      },
      {
        name: "get_artist_details",
        category: "Artist Management",
        description: "GET /artist/:id",
        run: () => this.testGetArtistDetails(),
      },
      {
        name: "update_artist",
        category: "Artist Management",
        description: "PUT /artist/:id",
        run: () => this.testUpdateArtist(),
      },
      {
        name: "list_smartlinks",
        category: "Smart Links",
        description: "GET /smartlinks",
        run: () => this.testListSmartlinks(),
      },
      {
        name: "create_smartlink",
        category: "Smart Links",
        description: "POST /smartlink",
        run: () => this.testCreateSmartlink(),
      },
      {
        name: "smartlink_analytics",
        category: "Smart Links",
        description: "GET /smartlink/:id/analytics",
        run: () => this.testSmartlinkAnalytics(),
      },
      {
        name: "create_presave",
        category: "Campaigns",
        description: "POST /smartlink/pre-save",
        run: () => this.testCreatePresave(),
      },
      {
        name: "list_campaigns",
        category: "Campaigns",
        description: "GET /campaigns",
        run: () => this.testListCampaigns(),
      },
      {
        name: "list_actionpages",
        category: "Action Pages",
        description: "GET /actionpages",
        run: () => this.testListActionPages(),
      },
      {
        name: "create_actionpage",
        category: "Action Pages",
        description: "POST /actionpage",
        run: () => this.testCreateActionPage(),
      },
      {
        name: "create_release",
        category: "Releases",
        description: "POST /releases",
        run: () => this.testCreateRelease(),
      },
      {
        name: "create_webhook",
        category: "Webhooks",
        description: "POST /webhooks",
        run: () => this.testCreateWebhook(),
      },
      {
        name: "overview_analytics",
        category: "Analytics",
        description: "GET /analytics/overview",
        run: () => this.testOverviewAnalytics(),
      },
      {
        name: "partners_api",
        category: "Partners API",
        description: "GET /v2/promoted",
        run: () => this.testPartnersPromoted(),
      },
    ];
  }

  async runAllTests(): Promise<boolean> {
    this.display.runHeader([
      `${this.config.getEnvName()} Environment - FULL TEST SUITE`,
      `Write operations: ${this.config.canWrite() ? "ENABLED" : "DISABLED"}`,
    ]);

    this.display.header("Authentication Tests");
    await this.testBasicAuth();
    await this.testJwtAuth();

    this.display.header("Artist Management Tests");
    await this.testListArtists();
    await this.testCreateArtist();
    await this.testGetArtistDetails();
    await this.testUpdateArtist();

    this.display.header("Smart Links Tests");
    await this.testListSmartlinks();
    await this.testCreateSmartlink();
    await this.testSmartlinkAnalytics();

    this.display.header("Campaign Tests");
    await this.testCreatePresave();
    await this.testListCampaigns();

    this.display.header("Action Pages Tests");
    await this.testListActionPages();
    await this.testCreateActionPage();

    this.display.header("Releases Tests");
    await this.testCreateRelease();

    this.display.header("Webhooks Tests");
    await this.testCreateWebhook();

    this.display.header("Analytics Tests");
    await this.testOverviewAnalytics();

    this.display.header("Partners API Tests");
    await this.testPartnersPromoted();

    const passed = await this.finish();
    this.display.resources(this.recorder.getResources());
    return passed;
  }
}
