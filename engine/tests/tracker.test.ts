/**
 * apptrack Engine -- Tracker Tests
 *
 * Runs the tasks against a temporary store, with product handlers that
 * need no network and a stubbed fetch for the installer downloads.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { CatalogStore, ensureEntry, Product } from "@apptrack/catalog";
import { ApplicationConfig, TrackerConfig } from "../src/config";
import { TrackerFailure } from "../src/errors";
import { BaseProduct, ProductContext } from "../src/products/base-product";
import { HandlerRegistry } from "../src/products/registry";
import { RenderedReport, ReportHandler } from "../src/report";
import { DEACTIVATED, Tracker, TrackerOptions } from "../src/tracker";
import { TrackerEvent } from "../src/types";
import { createLogger } from "../src/utils/logger";

const TEST_DIR = path.join(os.tmpdir(), "apptrack-tracker-test");
const STORE = path.join(TEST_DIR, "store");
const INSTALLER = "fake-installer";

class FakeProduct extends BaseProduct {
  constructor() {
    super();
    this.name = "fake";
    this.target = "x64";
  }

  async getOrigin(_ctx: ProductContext): Promise<void> {
    this.version = "2.0";
    this.display_name = "Fake Tool 2.0";
    this.published = "2026-01-02T03:04:05";
    this.location = "https://example.com/fake-setup.exe";
    this.silent_inst_args = "/quiet";
  }
}

class BrokenProduct extends BaseProduct {
  constructor() {
    super();
    this.name = "broken";
  }

  async getOrigin(_ctx: ProductContext): Promise<void> {
    throw new TrackerFailure("NETWORK_ERROR", "Feed unreachable");
  }
}

/** Publishes a release date that does not exist */
class BadDateProduct extends FakeProduct {
  constructor() {
    super();
    this.name = "bad-date";
  }

  async getOrigin(ctx: ProductContext): Promise<void> {
    await super.getOrigin(ctx);
    this.published = "2015-13-32T00:00:00";
  }
}

const registry = new HandlerRegistry()
  .register("fake", () => new FakeProduct())
  .register("broken", () => new BrokenProduct())
  .register("bad-date", () => new BadDateProduct());

function app(id: string, overrides: Partial<ApplicationConfig> = {}): ApplicationConfig {
  return {
    id,
    enabled: true,
    handler: id,
    path: path.join(STORE, id),
    set: "__all__",
    applists: ["all"],
    ...overrides,
  };
}

function makeConfig(applications: ApplicationConfig[]): TrackerConfig {
  return {
    file: "",
    store: STORE,
    logLevel: "silent",
    allowInsecure: false,
    timeoutMs: 5000,
    reports: null,
    sets: {},
    applists: ["all", "office"],
    applications,
  };
}

function makeTracker(
  applications: ApplicationConfig[],
  options: Partial<TrackerOptions> = {},
): Tracker {
  return new Tracker({
    config: makeConfig(applications),
    registry,
    logger: createLogger({ level: "silent" }),
    now: () => new Date(2026, 0, 31, 8, 30, 0),
    ...options,
  });
}

function loadCatalog() {
  const loaded = new CatalogStore(STORE).load();
  if (!loaded.ok) throw new Error(loaded.message);
  return loaded.catalog;
}

/** Catalog with `product` already approved for `appId` */
function seedApproved(appId: string, product: Product): void {
  const store = new CatalogStore(STORE);
  const loaded = store.load();
  if (!loaded.ok) throw new Error(loaded.message);
  ensureEntry(loaded.catalog, appId).approved = product;
  store.save(loaded.catalog, new Date(2026, 0, 1));
}

async function latestFake(): Promise<Product> {
  const product = new FakeProduct();
  await product.getOrigin({
    logger: createLogger({ level: "silent" }),
    allowInsecure: false,
    now: () => new Date(),
  });
  return product.dump();
}

beforeEach(() => {
  fs.rmSync(TEST_DIR, { recursive: true, force: true });
  vi.stubGlobal(
    "fetch",
    vi.fn(async () => new Response(INSTALLER, { headers: { "content-length": "14" } })),
  );
});

afterEach(() => {
  vi.unstubAllGlobals();
  fs.rmSync(TEST_DIR, { recursive: true, force: true });
});

// ────────────────────────────────────────────────────────────────
// pull
// ────────────────────────────────────────────────────────────────

describe("Tracker.pull", () => {
  it("records a newer release as pulled", async () => {
    const result = await makeTracker([app("fake")]).pull();

    expect(result.ok).toBe(true);
    expect(result.task).toBe("pull");
    expect(result.outcomes).toEqual([{ app_id: "fake", status: "updated", version: "2.0" }]);

    const catalog = loadCatalog();
    expect(catalog.modified).toBe("2026-01-31T08:30:00");
    const entry = catalog.products.fake;
    expect(entry.fetched).toEqual({});
    expect(entry.approved).toEqual({});
    expect(entry.pulled).toEqual(await latestFake());
  });

  it("leaves the catalog unchanged when the approved release is the latest", async () => {
    seedApproved("fake", await latestFake());

    const result = await makeTracker([app("fake")]).pull();

    expect(result.outcomes).toEqual([{ app_id: "fake", status: "unchanged", version: "2.0" }]);
    expect(loadCatalog().products.fake.pulled).toEqual({});
  });

  it("skips disabled applications", async () => {
    const result = await makeTracker([app("fake", { enabled: false })]).pull();
    expect(result.outcomes).toEqual([
      { app_id: "fake", status: "disabled", message: DEACTIVATED },
    ]);
    expect(loadCatalog().products).toEqual({});
  });

  it("records a failing application and goes on", async () => {
    const result = await makeTracker([app("broken"), app("fake")]).pull();

    expect(result.ok).toBe(false);
    expect(result.errors).toEqual([
      { category: "NETWORK_ERROR", message: "Feed unreachable", app_id: "broken" },
    ]);
    expect(result.outcomes.map((o) => o.status)).toEqual(["failed", "updated"]);
    expect(result.outcomes[0].message).toBe("Feed unreachable");
  });

  it("fails an application whose release the catalog cannot hold", async () => {
    const tracker = makeTracker([app("bad-date"), app("fake")]);

    const result = await tracker.pull();

    expect(result.errors).toMatchObject([
      {
        category: "HANDLER_ERROR",
        message:
          "The pulled product is not valid: /products/bad-date/pulled/published: " +
          '"2015-13-32T00:00:00" is not a valid date and time',
        app_id: "bad-date",
      },
    ]);
    expect(result.outcomes.map((o) => o.status)).toEqual(["failed", "updated"]);
    expect(loadCatalog().products["bad-date"].pulled).toEqual({});

    const again = await tracker.pull();
    expect(again.errors.map((e) => e.category)).toEqual(["HANDLER_ERROR"]);
    expect(loadCatalog().products.fake.pulled).toEqual(await latestFake());
  });

  it("fails an application whose handler is unknown", async () => {
    const result = await makeTracker([app("ghost")]).pull();
    expect(result.errors[0].category).toBe("CONFIG_ERROR");
    expect(result.errors[0].message).toBe('Unknown handler "ghost"');
  });

  it("reports an unreadable catalog without touching it", async () => {
    fs.mkdirSync(STORE, { recursive: true });
    const file = path.join(STORE, "catalog.json");
    fs.writeFileSync(file, "not json", "utf-8");

    const result = await makeTracker([app("fake")]).pull();

    expect(result.ok).toBe(false);
    expect(result.outcomes).toEqual([]);
    expect(result.errors[0].category).toBe("CATALOG_ERROR");
    expect(fs.readFileSync(file, "utf-8")).toBe("not json");
  });
});

// ────────────────────────────────────────────────────────────────
// fetch
// ────────────────────────────────────────────────────────────────

describe("Tracker.fetch", () => {
  it("downloads pulled releases and moves them to fetched", async () => {
    const tracker = makeTracker([app("fake")]);
    await tracker.pull();

    const result = await tracker.fetch();

    expect(result.outcomes).toEqual([{ app_id: "fake", status: "fetched", version: "2.0" }]);
    const installer = path.join(STORE, "fake", "fake_v2.0_x64.exe");
    expect(fs.readFileSync(installer, "utf-8")).toBe(INSTALLER);

    const entry = loadCatalog().products.fake;
    expect(entry.pulled).toEqual({});
    expect(entry.fetched).toMatchObject({ installer, file_size: 14, version: "2.0" });
  });

  it("leaves a catalog that reloads after pull and fetch", async () => {
    const tracker = makeTracker([app("fake")]);
    const store = new CatalogStore(STORE);

    await tracker.pull();
    const afterPull = store.load();
    expect(afterPull.ok).toBe(true);

    await tracker.fetch();
    const afterFetch = store.load();
    expect(afterFetch.ok).toBe(true);
    if (!afterFetch.ok) return;
    expect(afterFetch.created).toBe(false);
    expect(afterFetch.catalog.products.fake.fetched).toMatchObject({
      version: "2.0",
      file_size: 14,
      published: "2026-01-02T03:04:05",
    });
  });

  it("skips applications with nothing pulled", async () => {
    const tracker = makeTracker([app("fake")]);
    seedApproved("fake", await latestFake());

    const result = await tracker.fetch();
    expect(result.outcomes).toEqual([
      { app_id: "fake", status: "skipped", message: "Nothing pulled" },
    ]);
  });

  it("warns about applications missing from the catalog", async () => {
    const tracker = makeTracker([app("fake")]);
    const events: TrackerEvent[] = [];
    tracker.on((event) => events.push(event));

    const result = await tracker.fetch();

    expect(result.outcomes[0]).toEqual({
      app_id: "fake",
      status: "skipped",
      message: "Not in the catalog",
    });
    const warning = events.find((event) => event.type === "warning");
    expect(warning?.data).toEqual({
      message: "fake is not in the catalog yet, pull it first",
      app_id: "fake",
    });
  });

  it("emits download progress", async () => {
    const tracker = makeTracker([app("fake")]);
    await tracker.pull();
    const events: TrackerEvent[] = [];
    tracker.on((event) => events.push(event));

    await tracker.fetch();

    const progress = events.filter((event) => event.type === "progress");
    expect(progress.length).toBeGreaterThan(0);
    expect(progress[progress.length - 1].data).toEqual({
      app_id: "fake",
      bytes_downloaded: 14,
      bytes_total: 14,
      percent: 100,
    });
  });
});

// ────────────────────────────────────────────────────────────────
// approve
// ────────────────────────────────────────────────────────────────

describe("Tracker.approve", () => {
  async function fetchedTracker(options: Partial<TrackerOptions> = {}): Promise<Tracker> {
    const tracker = makeTracker([app("fake")], options);
    await tracker.pull();
    await tracker.fetch();
    return tracker;
  }

  it("asks the operator and approves", async () => {
    const prompt = vi.fn(async (_product: Product, _appId: string) => true);
    const tracker = await fetchedTracker({ prompt });

    const result = await tracker.approve();

    expect(result.outcomes).toEqual([{ app_id: "fake", status: "approved", version: "2.0" }]);
    expect(prompt).toHaveBeenCalledTimes(1);
    expect(prompt.mock.calls[0]).toEqual([expect.objectContaining({ version: "2.0" }), "fake"]);
    const entry = loadCatalog().products.fake;
    expect(entry.fetched).toEqual({});
    expect(entry.approved).toMatchObject({ version: "2.0", file_size: 14 });
  });

  it("keeps a rejected release fetched", async () => {
    const tracker = await fetchedTracker({ prompt: async () => false });

    const result = await tracker.approve();

    expect(result.outcomes).toEqual([{ app_id: "fake", status: "rejected", version: "2.0" }]);
    expect(loadCatalog().products.fake.fetched).toMatchObject({ version: "2.0" });
  });

  it("does not approve without an operator unless forced", async () => {
    const tracker = await fetchedTracker();

    const skipped = await tracker.approve();
    expect(skipped.outcomes[0]).toEqual({
      app_id: "fake",
      status: "skipped",
      version: "2.0",
      message: "No operator to ask, approval must be forced",
    });

    const forced = await tracker.approve(true);
    expect(forced.outcomes[0].status).toBe("approved");
  });

  it("skips applications with nothing fetched", async () => {
    const tracker = makeTracker([app("fake")]);
    await tracker.pull();
    const result = await tracker.approve(true);
    expect(result.outcomes[0]).toEqual({
      app_id: "fake",
      status: "skipped",
      message: "Nothing fetched",
    });
  });
});

// ────────────────────────────────────────────────────────────────
// make and run
// ────────────────────────────────────────────────────────────────

describe("Tracker.make", () => {
  it("writes one applist per name from the approved products", async () => {
    fs.mkdirSync(STORE, { recursive: true });
    fs.writeFileSync(path.join(STORE, "applist-old.txt"), "stale\n", "utf-8");
    fs.writeFileSync(path.join(STORE, "notes.txt"), "keep\n", "utf-8");
    const approved = { ...(await latestFake()), installer: "/store/fake/fake_v2.0_x64.exe" };
    seedApproved("fake", approved);

    const result = await makeTracker([app("fake"), app("broken")]).make();

    expect(result.ok).toBe(true);
    expect(result.outcomes).toEqual([
      { app_id: "fake", status: "listed", version: "2.0" },
      { app_id: "broken", status: "skipped", message: "Nothing approved" },
    ]);
    expect(fs.readFileSync(path.join(STORE, "applist-all.txt"), "utf-8").split("\n")).toEqual([
      '# apptrack 0.3.0 - applist "all"',
      "# Generated on 2026-01-31T08:30:00",
      "# This file is automatically generated. Do not edit it by hand.",
      "#",
      "# target;display_name;version;installer;silent_inst_args",
      "x64;Fake Tool 2.0;2.0;/store/fake/fake_v2.0_x64.exe;/quiet",
      "",
    ]);
    expect(fs.readFileSync(path.join(STORE, "applist-office.txt"), "utf-8").split("\n")).toHaveLength(6);
    expect(fs.existsSync(path.join(STORE, "applist-old.txt"))).toBe(false);
    expect(fs.existsSync(path.join(STORE, "notes.txt"))).toBe(true);
  });
});

describe("Tracker.run", () => {
  it("chains the tasks, forcing approval", async () => {
    const result = await makeTracker([app("fake")]).run();

    expect(result.task).toBe("run");
    expect(result.ok).toBe(true);
    expect(result.steps?.map((step) => step.task)).toEqual(["pull", "fetch", "approve", "make"]);
    expect(result.outcomes.map((o) => o.status)).toEqual([
      "updated",
      "fetched",
      "approved",
      "listed",
    ]);
    expect(fs.readFileSync(path.join(STORE, "applist-all.txt"), "utf-8")).toContain(
      "x64;Fake Tool 2.0;2.0;",
    );
  });
});

// ────────────────────────────────────────────────────────────────
// Events and reports
// ────────────────────────────────────────────────────────────────

describe("Tracker events", () => {
  it("reports task start, every application and task end", async () => {
    const tracker = makeTracker([app("fake"), app("broken", { enabled: false })]);
    const events: TrackerEvent[] = [];
    tracker.on((event) => events.push(event));

    await tracker.pull();

    expect(events.map((event) => event.type)).toEqual([
      "task_start",
      "product",
      "product",
      "task_end",
    ]);
    const [start, first, second] = events;
    expect(start.type === "task_start" && start.data).toEqual({ count: 2 });
    expect(first.type === "product" && first.position).toEqual({ index: 1, count: 2 });
    expect(second.type === "product" && second.data.status).toBe("disabled");
  });

  it("goes on when an event handler throws", async () => {
    const tracker = makeTracker([app("fake")]);
    tracker.on(() => {
      throw new Error("listener failure");
    });
    const result = await tracker.pull();
    expect(result.ok).toBe(true);
  });
});

describe("Tracker reports", () => {
  it("writes the report of a task that changed something", async () => {
    const reports = path.join(TEST_DIR, "reports");
    const tracker = new Tracker({
      config: { ...makeConfig([app("fake")]), reports: { directory: reports, format: "text" } },
      registry,
      logger: createLogger({ level: "silent" }),
      now: () => new Date(2026, 0, 31, 8, 30, 0),
    });

    const result = await tracker.pull();

    const file = path.join(reports, "pull.txt");
    expect(result.report_path).toBe(file);
    expect(fs.readFileSync(file, "utf-8").split("\n")[2]).toBe("Fake Tool 2.0 [fake]");
  });

  it("publishes nothing when nothing changed", async () => {
    const received: RenderedReport[] = [];
    const handler: ReportHandler = {
      async publish(report) {
        received.push(report);
        return null;
      },
    };
    seedApproved("fake", await latestFake());

    const result = await makeTracker([app("fake")], { reportHandlers: [handler] }).pull();

    expect(result.report_path).toBeUndefined();
    expect(received).toEqual([]);
  });

  it("publishes to extra handlers", async () => {
    const received: RenderedReport[] = [];
    const handler: ReportHandler = {
      async publish(report) {
        received.push(report);
        return null;
      },
    };

    await makeTracker([app("fake")], { reportHandlers: [handler] }).pull();

    expect(received).toHaveLength(1);
    expect(received[0].format).toBe("text");
    expect(received[0].task).toBe("pull");
  });
});
