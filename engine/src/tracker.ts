/**
 * apptrack Engine — Tracker
 *
 * Runs the tasks over the applications of the configuration, in
 * configuration order:
 *
 *   pull     latest release information → catalog "pulled"
 *   fetch    installer download          "pulled"  → "fetched"
 *   approve  operator decision           "fetched" → "approved"
 *   make     applist files from the "approved" products
 *   run      all of the above, approval forced
 *
 * A failing application never stops a task: the error is recorded in the
 * task result and the next application is processed. The tracker has no
 * UI logic; front ends follow it through events.
 */

import * as fs from "fs";
import * as path from "path";
import {
  CatalogDocument,
  CatalogEntry,
  CatalogStore,
  checkProduct,
  ensureEntry,
  formatTimestamp,
  InvalidCatalogError,
  isProduct,
  Product,
  Stage,
} from "@apptrack/catalog";
import { applistFileName, applistHeader, applistNameOf, formatApplistLine } from "./applist";
import { ApplicationConfig, TrackerConfig } from "./config";
import { toTrackerError, TrackerFailure } from "./errors";
import { BaseProduct, ProductContext } from "./products/base-product";
import { HandlerRegistry } from "./products/registry";
import { FileReportHandler, Report, ReportHandler } from "./report";
import {
  ApprovalPrompt,
  Position,
  ProductOutcome,
  TaskName,
  TaskResult,
  TrackerError,
  TrackerEvent,
  TrackerEventHandler,
} from "./types";
import { Logger } from "./utils/logger";

export const DEACTIVATED = "Tracking deactivated";

export interface TrackerOptions {
  config: TrackerConfig;
  registry: HandlerRegistry;
  logger: Logger;
  /** Asked before approving a release, unless approval is forced */
  prompt?: ApprovalPrompt;
  /** Handlers every report is published to, besides the configured directory */
  reportHandlers?: ReportHandler[];
  now?: () => Date;
}

interface TaskState {
  task: TaskName;
  startedAt: string;
  outcomes: ProductOutcome[];
  errors: TrackerError[];
}

type AppStep = (app: ApplicationConfig, logger: Logger) => Promise<ProductOutcome>;

export class Tracker {
  private readonly config: TrackerConfig;
  private readonly registry: HandlerRegistry;
  private readonly logger: Logger;
  private readonly prompt?: ApprovalPrompt;
  private readonly reportHandlers: ReportHandler[];
  private readonly now: () => Date;
  private readonly store: CatalogStore;
  private eventHandlers: TrackerEventHandler[] = [];

  constructor(options: TrackerOptions) {
    this.config = options.config;
    this.registry = options.registry;
    this.logger = options.logger;
    this.prompt = options.prompt;
    this.reportHandlers = options.reportHandlers ?? [];
    this.now = options.now ?? (() => new Date());
    this.store = new CatalogStore(options.config.store);
  }

  // ─── Event System ────────────────────────────────────────────

  on(handler: TrackerEventHandler): void {
    this.eventHandlers.push(handler);
  }

  private emit(event: TrackerEvent): void {
    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (err: unknown) {
        this.logger.warn({ err, event: event.type }, "Event handler failed");
      }
    }
  }

  private timestamp(): string {
    return this.now().toISOString();
  }

  private warn(task: TaskName, message: string, appId?: string): void {
    this.logger.warn({ task, app: appId }, message);
    this.emit({
      type: "warning",
      timestamp: this.timestamp(),
      task,
      data: { message, app_id: appId },
    });
  }

  // ─── Tasks ───────────────────────────────────────────────────

  /**
   * Look up the latest release of every application and record it as
   * pulled when it is newer than the approved one.
   */
  async pull(): Promise<TaskResult> {
    return this.catalogTask("pull", async (catalog, report, app, logger) => {
      const origin = this.createProduct(app);
      const entry = ensureEntry(catalog, app.id);
      const approved = isProduct(entry.approved) ? entry.approved : null;
      if (approved) origin.load(approved);
      const deployed = origin.dump();

      await origin.getOrigin(this.productContext(app, logger, "pull"));
      if (!origin.isUpdate(deployed, logger)) {
        return { app_id: app.id, status: "unchanged", version: deployed.version };
      }

      const pulled = origin.dump();
      this.place(entry, app, "pulled", pulled);
      report.addSection(app.id, pulled);
      return { app_id: app.id, status: "updated", version: pulled.version };
    });
  }

  /** Download the installer of every pulled release. */
  async fetch(): Promise<TaskResult> {
    return this.catalogTask("fetch", async (catalog, report, app, logger) => {
      const entry = catalog.products[app.id];
      if (!entry) {
        this.warn("fetch", `${app.id} is not in the catalog yet, pull it first`, app.id);
        return { app_id: app.id, status: "skipped", message: "Not in the catalog" };
      }
      if (!isProduct(entry.pulled)) {
        return { app_id: app.id, status: "skipped", message: "Nothing pulled" };
      }

      const product = this.createProduct(app);
      product.load(entry.pulled);
      await product.fetch(app.path, this.productContext(app, logger, "fetch"));

      const fetched = product.dump();
      this.place(entry, app, "fetched", fetched);
      entry.pulled = {};
      report.addSection(app.id, fetched);
      return { app_id: app.id, status: "fetched", version: fetched.version };
    });
  }

  /**
   * Approve every fetched release, asking the operator unless `force`.
   */
  async approve(force = false): Promise<TaskResult> {
    return this.catalogTask("approve", async (catalog, report, app) => {
      const entry = catalog.products[app.id];
      if (!entry) {
        this.warn("approve", `${app.id} is not in the catalog yet, pull it first`, app.id);
        return { app_id: app.id, status: "skipped", message: "Not in the catalog" };
      }
      const fetched = entry.fetched;
      if (!isProduct(fetched)) {
        return { app_id: app.id, status: "skipped", message: "Nothing fetched" };
      }

      let accepted = force;
      if (!accepted) {
        if (!this.prompt) {
          return {
            app_id: app.id,
            status: "skipped",
            version: fetched.version,
            message: "No operator to ask, approval must be forced",
          };
        }
        accepted = await this.prompt(fetched, app.id);
      }
      if (!accepted) {
        return { app_id: app.id, status: "rejected", version: fetched.version };
      }

      entry.approved = fetched;
      entry.fetched = {};
      report.addSection(app.id, fetched);
      return { app_id: app.id, status: "approved", version: fetched.version };
    });
  }

  /**
   * Rewrite the applists of the store: one file per applist declared by
   * the sets, one line per approved product of an enabled application.
   */
  async make(): Promise<TaskResult> {
    const state = this.startTask("make");
    const loaded = this.store.load();
    if (!loaded.ok) {
      state.errors.push({ category: "CATALOG_ERROR", message: loaded.message });
      return this.endTask(state);
    }
    const catalog = loaded.catalog;

    const contents = new Map<string, string[]>();
    const generated = formatTimestamp(this.now());
    for (const name of this.config.applists) {
      contents.set(name, [applistHeader(name, generated)]);
    }

    await this.forEachApp(state, async (app) => {
      const entry = catalog.products[app.id];
      const approved = entry && isProduct(entry.approved) ? entry.approved : null;
      if (!approved) {
        return { app_id: app.id, status: "skipped", message: "Nothing approved" };
      }
      const line = formatApplistLine(approved);
      for (const name of app.applists) {
        contents.get(name)?.push(line + "\n");
      }
      return { app_id: app.id, status: "listed", version: approved.version };
    });

    try {
      await this.writeApplists(contents);
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      state.errors.push({ category: "IO_ERROR", message: `Cannot write the applists: ${msg}` });
    }
    return this.endTask(state);
  }

  /**
   * pull, fetch, approve (forced) and make, one after the other. A failing
   * step does not stop the cycle.
   */
  async run(): Promise<TaskResult> {
    const state = this.startTask("run");
    const steps = [await this.pull(), await this.fetch(), await this.approve(true), await this.make()];
    for (const step of steps) {
      state.outcomes.push(...step.outcomes);
      state.errors.push(...step.errors);
    }
    return this.endTask(state, { steps });
  }

  // ─── Internals ───────────────────────────────────────────────

  private startTask(task: TaskName): TaskState {
    this.logger.info({ task }, "Task started");
    this.emit({
      type: "task_start",
      timestamp: this.timestamp(),
      task,
      data: { count: this.config.applications.length },
    });
    return { task, startedAt: this.timestamp(), outcomes: [], errors: [] };
  }

  private endTask(state: TaskState, extra: Partial<TaskResult> = {}): TaskResult {
    const result: TaskResult = {
      task: state.task,
      ok: state.errors.length === 0 && (extra.steps ?? []).every((step) => step.ok),
      started_at: state.startedAt,
      finished_at: this.timestamp(),
      outcomes: state.outcomes,
      errors: state.errors,
      ...extra,
    };
    this.logger.info(
      { task: state.task, ok: result.ok, errors: result.errors.length },
      "Task finished",
    );
    this.emit({ type: "task_end", timestamp: this.timestamp(), task: state.task, data: result });
    return result;
  }

  /**
   * Load the catalog, apply `step` to every enabled application, save the
   * catalog whatever happened and publish the report.
   */
  private async catalogTask(
    task: TaskName,
    step: (
      catalog: CatalogDocument,
      report: Report,
      app: ApplicationConfig,
      logger: Logger,
    ) => Promise<ProductOutcome>,
  ): Promise<TaskResult> {
    const state = this.startTask(task);
    const loaded = this.store.load();
    if (!loaded.ok) {
      state.errors.push({
        category: "CATALOG_ERROR",
        message: loaded.message,
        details: loaded.errors.length > 0 ? { errors: loaded.errors } : undefined,
      });
      return this.endTask(state);
    }
    if (loaded.created) {
      this.logger.info({ path: loaded.path }, "No catalog yet, starting a new one");
    }

    const catalog = loaded.catalog;
    const report = this.createReport(task);
    await this.forEachApp(state, (app, logger) => step(catalog, report, app, logger));

    try {
      this.store.save(catalog, this.now());
    } catch (err: unknown) {
      if (err instanceof InvalidCatalogError) {
        state.errors.push({
          category: "CATALOG_ERROR",
          message: err.message,
          details: { errors: err.errors },
        });
      } else {
        const msg = err instanceof Error ? err.message : String(err);
        state.errors.push({ category: "IO_ERROR", message: `Cannot save the catalog: ${msg}` });
      }
    }

    let reportPath: string | undefined;
    if (!report.isEmpty) {
      try {
        [reportPath] = await report.publish();
      } catch (err: unknown) {
        const msg = err instanceof Error ? err.message : String(err);
        state.errors.push({ category: "IO_ERROR", message: `Cannot publish the report: ${msg}` });
      }
    }
    return this.endTask(state, reportPath ? { report_path: reportPath } : {});
  }

  private async forEachApp(state: TaskState, step: AppStep): Promise<void> {
    const apps = this.config.applications;
    for (const [i, app] of apps.entries()) {
      const position: Position = { index: i + 1, count: apps.length };
      const logger = this.logger.child({ task: state.task, app: app.id });

      let outcome: ProductOutcome;
      if (!app.enabled) {
        logger.info(DEACTIVATED);
        outcome = { app_id: app.id, status: "disabled", message: DEACTIVATED };
      } else {
        try {
          outcome = await step(app, logger);
        } catch (err: unknown) {
          const error = toTrackerError(err, app.id);
          logger.error({ category: error.category, err: error.message }, "Application failed");
          state.errors.push(error);
          outcome = { app_id: app.id, status: "failed", message: error.message };
        }
      }

      state.outcomes.push(outcome);
      this.emit({
        type: "product",
        timestamp: this.timestamp(),
        task: state.task,
        position,
        data: outcome,
      });
    }
  }

  /**
   * Put a handler's product at `stage`. A product the catalog would not
   * load back fails the application and leaves the entry untouched.
   */
  private place(entry: CatalogEntry, app: ApplicationConfig, stage: Stage, product: Product): void {
    const errors = checkProduct(app.id, stage, product);
    if (errors.length > 0) {
      const [first] = errors;
      throw new TrackerFailure(
        "HANDLER_ERROR",
        `The ${stage} product is not valid: ${first.path}: ${first.message}`,
        { errors },
      );
    }
    entry[stage] = product;
  }

  private createProduct(app: ApplicationConfig): BaseProduct {
    const product = this.registry.create(app.handler);
    if (!product) {
      throw new TrackerFailure("CONFIG_ERROR", `Unknown handler "${app.handler}"`, {
        handler: app.handler,
      });
    }
    return product;
  }

  private productContext(app: ApplicationConfig, logger: Logger, task: TaskName): ProductContext {
    return {
      logger,
      allowInsecure: this.config.allowInsecure,
      now: this.now,
      timeoutMs: this.config.timeoutMs,
      onProgress: (progress) =>
        this.emit({
          type: "progress",
          timestamp: this.timestamp(),
          task,
          data: { app_id: app.id, ...progress },
        }),
    };
  }

  private createReport(task: TaskName): Report {
    const reports = this.config.reports;
    const report = new Report(task, reports?.format ?? "text", this.logger, this.now);
    if (reports) report.addHandler(new FileReportHandler(reports.directory));
    for (const handler of this.reportHandlers) report.addHandler(handler);
    return report;
  }

  private async writeApplists(contents: Map<string, string[]>): Promise<void> {
    const dir = this.config.store;
    await fs.promises.mkdir(dir, { recursive: true });
    for (const file of await fs.promises.readdir(dir)) {
      if (applistNameOf(file) !== null) {
        await fs.promises.rm(path.join(dir, file), { force: true });
      }
    }
    for (const [name, parts] of contents) {
      const file = path.join(dir, applistFileName(name));
      await fs.promises.writeFile(file, parts.join(""), "utf-8");
      this.logger.info({ file, lines: parts.length - 1 }, "Applist written");
    }
  }
}

