/**
 * apptrack Engine — Task Reports
 *
 * A report collects one section per product a task changed (a release
 * pulled, an installer fetched, a release approved) and publishes the
 * rendered document to its handlers.
 */

import * as fs from "fs";
import * as path from "path";
import { formatTimestamp, Product } from "@apptrack/catalog";
import { ReportFormat } from "./config";
import { TaskName } from "./types";
import { escapeHtml } from "./utils/html";
import { Logger } from "./utils/logger";
import { PROJECT_NAME, PROJECT_VERSION } from "./version";

export interface ReportSection {
  app_id: string;
  product: Product;
}

export interface RenderedReport {
  task: TaskName;
  format: ReportFormat;
  content: string;
}

export interface ReportHandler {
  /** Publish the report; resolves to where it went, when that is a file */
  publish(report: RenderedReport): Promise<string | null>;
}

const EXTENSIONS: Record<ReportFormat, string> = { html: "html", text: "txt" };

function formatHash(product: Product): string {
  return product.secure_hash ? `${product.secure_hash[1]} (${product.secure_hash[0]})` : "";
}

function formatSize(product: Product): string {
  return product.file_size >= 0 ? `${product.file_size} bytes` : "unknown";
}

/** Label / value pairs shown for every product */
function attributeRows(product: Product): [string, string][] {
  return [
    ["Version", product.version],
    ["Published", product.published],
    ["Target", product.target],
    ["Editor", product.editor],
    ["Web site", product.web_site_location],
    ["Release note", product.release_note_location],
    ["URL", product.location],
    ["Installer", product.installer],
    ["Size", formatSize(product)],
    ["Hash", formatHash(product)],
    ["Silent mode", product.silent_inst_args],
    ["Standard mode", product.std_inst_args],
  ];
}

export function renderText(task: TaskName, sections: ReportSection[], generated: string): string {
  const lines = [`${PROJECT_NAME} ${PROJECT_VERSION} - ${task} report - ${generated}`, ""];
  for (const { app_id, product } of sections) {
    lines.push(`${product.display_name || product.name} [${app_id}]`);
    for (const [label, value] of attributeRows(product)) {
      lines.push(`  ${`${label}:`.padEnd(15)}${value}`);
    }
    if (product.change_summary) {
      lines.push("  Change summary:", `    ${product.change_summary}`);
    }
    lines.push("");
  }
  return lines.join("\n");
}

export function renderHtml(task: TaskName, sections: ReportSection[], generated: string): string {
  const title = `${PROJECT_NAME} ${task} report`;
  const body = sections
    .map(({ app_id, product }) => {
      const rows = attributeRows(product)
        .map(([label, value]) => `<tr><th>${label}</th><td>${escapeHtml(value)}</td></tr>`)
        .join("\n");
      // change_summary is an HTML fragment written by the handler
      const summary = product.change_summary
        ? `<div class="change-summary">${product.change_summary}</div>\n`
        : "";
      return (
        `<section id="${escapeHtml(app_id)}">\n` +
        `<h2>${escapeHtml(product.display_name || product.name)}</h2>\n` +
        `<table>\n${rows}\n</table>\n${summary}</section>`
      );
    })
    .join("\n");

  return (
    `<!DOCTYPE html>\n<html>\n<head>\n<meta charset="utf-8">\n<title>${title}</title>\n</head>\n` +
    `<body>\n<h1>${title}</h1>\n<p>Generated on ${generated} by ${PROJECT_NAME} ${PROJECT_VERSION}</p>\n` +
    `${body}\n</body>\n</html>\n`
  );
}

export class Report {
  private sections: ReportSection[] = [];
  private handlers: ReportHandler[] = [];

  constructor(
    readonly task: TaskName,
    readonly format: ReportFormat,
    private readonly logger: Logger,
    private readonly now: () => Date = () => new Date(),
  ) {}

  addSection(appId: string, product: Product): void {
    this.sections.push({ app_id: appId, product });
  }

  addHandler(handler: ReportHandler): void {
    this.handlers.push(handler);
  }

  get isEmpty(): boolean {
    return this.sections.length === 0;
  }

  render(): RenderedReport {
    const generated = formatTimestamp(this.now());
    const content =
      this.format === "html"
        ? renderHtml(this.task, this.sections, generated)
        : renderText(this.task, this.sections, generated);
    return { task: this.task, format: this.format, content };
  }

  /**
   * Publish to every handler. Resolves to the files written.
   */
  async publish(): Promise<string[]> {
    if (this.handlers.length === 0) {
      this.logger.info({ task: this.task }, "No report handler, nothing published");
      return [];
    }
    const rendered = this.render();
    const written: string[] = [];
    for (const handler of this.handlers) {
      const location = await handler.publish(rendered);
      if (location) written.push(location);
    }
    this.logger.info({ task: this.task, files: written }, "Report published");
    return written;
  }
}

/** Writes `<directory>/<task>.<html|txt>`, replacing the previous report. */
export class FileReportHandler implements ReportHandler {
  constructor(private readonly directory: string) {}

  async publish(report: RenderedReport): Promise<string> {
    await fs.promises.mkdir(this.directory, { recursive: true });
    const file = path.join(this.directory, `${report.task}.${EXTENSIONS[report.format]}`);
    await fs.promises.writeFile(file, report.content, "utf-8");
    return file;
  }
}

/** Writes the report to a stream (stdout by default). */
export class StreamReportHandler implements ReportHandler {
  constructor(private readonly stream: NodeJS.WritableStream = process.stdout) {}

  async publish(report: RenderedReport): Promise<null> {
    await new Promise<void>((resolve, reject) => {
      this.stream.write(report.content, (err) => (err ? reject(err) : resolve()));
    });
    return null;
  }
}
