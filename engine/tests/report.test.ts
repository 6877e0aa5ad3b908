/**
 * apptrack Engine -- Task Report Tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { Writable } from "stream";
import { Product } from "@apptrack/catalog";
import {
  FileReportHandler,
  RenderedReport,
  renderHtml,
  renderText,
  Report,
  ReportHandler,
  StreamReportHandler,
} from "../src/report";
import { createLogger } from "../src/utils/logger";

const TEST_DIR = path.join(os.tmpdir(), "apptrack-report-test");
const GENERATED = "2026-01-31T08:30:00";
const logger = createLogger({ level: "silent" });
const now = () => new Date(2026, 0, 31, 8, 30, 0);

function makeProduct(overrides: Partial<Product> = {}): Product {
  return {
    name: "tool",
    display_name: "Example Tool 2.0",
    version: "2.0",
    published: "2026-01-02T03:04:05",
    target: "x64",
    description: "",
    editor: "Example Inc.",
    web_site_location: "https://example.com/",
    location: "https://example.com/tool.exe",
    icon: "",
    announce_location: "",
    feed_location: "",
    release_note_location: "",
    change_summary: "",
    installer: "/store/tool/tool_v2.0_x64.exe",
    file_size: 1024,
    secure_hash: ["sha1", "abc"],
    std_inst_args: "",
    silent_inst_args: "/S",
    ...overrides,
  };
}

// ────────────────────────────────────────────────────────────────
// Rendering
// ────────────────────────────────────────────────────────────────

describe("renderText", () => {
  it("lists one section per product", () => {
    const text = renderText("pull", [{ app_id: "tool", product: makeProduct() }], GENERATED);
    const lines = text.split("\n");

    expect(lines[0]).toBe("apptrack 0.3.0 - pull report - 2026-01-31T08:30:00");
    expect(lines[1]).toBe("");
    expect(lines[2]).toBe("Example Tool 2.0 [tool]");
    expect(lines[3]).toBe("  Version:       2.0");
    expect(lines).toContain("  Size:          1024 bytes");
    expect(lines).toContain("  Hash:          abc (sha1)");
    expect(lines).toContain("  Silent mode:   /S");
    expect(text.endsWith("\n")).toBe(true);
  });

  it("shows unknown sizes and the change summary", () => {
    const product = makeProduct({
      file_size: -1,
      secure_hash: null,
      change_summary: "<ul><li>Fix</li></ul>",
    });
    const lines = renderText("fetch", [{ app_id: "tool", product }], GENERATED).split("\n");

    expect(lines).toContain("  Size:          unknown");
    expect(lines).toContain("  Hash:          ");
    expect(lines.slice(-3)).toEqual(["  Change summary:", "    <ul><li>Fix</li></ul>", ""]);
  });

  it("names a product without display name by its name", () => {
    const product = makeProduct({ display_name: "" });
    const lines = renderText("pull", [{ app_id: "tool", product }], GENERATED).split("\n");
    expect(lines[2]).toBe("tool [tool]");
  });
});

describe("renderHtml", () => {
  it("escapes attribute values", () => {
    const product = makeProduct({
      display_name: "Tool <beta>",
      location: "https://example.com/get?id=1&os=win",
    });
    const html = renderHtml("approve", [{ app_id: 'a"b', product }], GENERATED);

    expect(html).toContain('<section id="a&quot;b">');
    expect(html).toContain("<h2>Tool &lt;beta&gt;</h2>");
    expect(html).toContain("<tr><th>URL</th><td>https://example.com/get?id=1&amp;os=win</td></tr>");
  });

  it("keeps the change summary as HTML", () => {
    const product = makeProduct({ change_summary: "<ul><li>Fix</li></ul>" });
    const html = renderHtml("pull", [{ app_id: "tool", product }], GENERATED);
    expect(html).toContain('<div class="change-summary"><ul><li>Fix</li></ul></div>');
  });

  it("titles the document after the task", () => {
    const html = renderHtml("fetch", [], GENERATED);
    expect(html).toContain("<title>apptrack fetch report</title>");
    expect(html).toContain("<p>Generated on 2026-01-31T08:30:00 by apptrack 0.3.0</p>");
  });
});

// ────────────────────────────────────────────────────────────────
// Report
// ────────────────────────────────────────────────────────────────

describe("Report", () => {
  beforeEach(() => {
    fs.rmSync(TEST_DIR, { recursive: true, force: true });
  });

  afterEach(() => {
    fs.rmSync(TEST_DIR, { recursive: true, force: true });
  });

  it("is empty until a section is added", () => {
    const report = new Report("pull", "text", logger, now);
    expect(report.isEmpty).toBe(true);
    report.addSection("tool", makeProduct());
    expect(report.isEmpty).toBe(false);
  });

  it("renders in its format with the current time", () => {
    const report = new Report("pull", "text", logger, now);
    report.addSection("tool", makeProduct());
    const rendered = report.render();

    expect(rendered.task).toBe("pull");
    expect(rendered.format).toBe("text");
    expect(rendered.content.split("\n")[0]).toBe(
      "apptrack 0.3.0 - pull report - 2026-01-31T08:30:00",
    );
  });

  it("publishes nothing without handlers", async () => {
    const report = new Report("pull", "text", logger, now);
    report.addSection("tool", makeProduct());
    await expect(report.publish()).resolves.toEqual([]);
  });

  it("writes one file per task and format", async () => {
    const report = new Report("fetch", "html", logger, now);
    report.addSection("tool", makeProduct());
    report.addHandler(new FileReportHandler(TEST_DIR));

    const written = await report.publish();

    const file = path.join(TEST_DIR, "fetch.html");
    expect(written).toEqual([file]);
    expect(fs.readFileSync(file, "utf-8")).toBe(report.render().content);
  });

  it("passes the rendered report to every handler", async () => {
    const received: RenderedReport[] = [];
    const collector: ReportHandler = {
      async publish(rendered) {
        received.push(rendered);
        return null;
      },
    };
    const report = new Report("approve", "text", logger, now);
    report.addSection("tool", makeProduct());
    report.addHandler(collector);
    report.addHandler(collector);

    await expect(report.publish()).resolves.toEqual([]);
    expect(received).toHaveLength(2);
    expect(received[0].task).toBe("approve");
  });

  it("writes to a stream", async () => {
    const chunks: string[] = [];
    const stream = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        chunks.push(chunk.toString("utf-8"));
        callback();
      },
    });
    const rendered: RenderedReport = { task: "pull", format: "text", content: "report body\n" };

    await expect(new StreamReportHandler(stream).publish(rendered)).resolves.toBeNull();
    expect(chunks.join("")).toBe("report body\n");
  });
});
