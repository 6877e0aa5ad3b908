/**
 * apptrack Engine — MakeMKV
 *
 * The editor publishes a PAD file (Portable Application Description,
 * XML) describing the latest release, and an HTML release history from
 * which the change summary is built.
 *
 * Release history layout:
 *
 *   <div id="content">
 *     <ul class="bullets">
 *       <li>MakeMKV v1.9.10 ( 25.4.2016 )</li>
 *       <ul class="bullets2"><li>note</li>...</ul>
 *       <li>MakeMKV v1.9.9 build 3</li>
 *       ...
 */

import * as cheerio from "cheerio";
import { isWellFormedTimestamp } from "@apptrack/catalog";
import { retrieveText } from "../downloader";
import { TrackerFailure } from "../errors";
import { escapeHtml } from "../utils/html";
import { compareVersionIds } from "../utils/version-id";
import { BaseProduct, ProductContext } from "./base-product";
import { XmlDocument } from "./xml";

export const PAD_URL = "https://www.makemkv.com/makemkv.xml";
export const HISTORY_URL = "https://www.makemkv.com/download/history.html";

export const NO_CHANGE_LOG = "No change log available";

export interface ReleaseNote {
  version: string;
  /** "YYYY-MM-DD" or "unknown" */
  published: string;
  /** HTML list of the changes */
  notes: string;
}

const TITLE_RE =
  /^MakeMKV v(\d+(?:\.\d+)+)(?:\s+\(\s*(\d+)\.(\d+)\.(\d+)\s*\)|\s+build\s+(\d+))?$/;

function pad2(value: string): string {
  return value.padStart(2, "0");
}

/**
 * Read a release title. Two-part versions get a ".0" patch; a build
 * number is kept as " build N".
 */
export function parseReleaseTitle(
  title: string,
): { version: string; published: string } | null {
  const match = TITLE_RE.exec(title.replace(/\s+/g, " ").trim());
  if (!match) return null;

  const parts = match[1].split(".").map((part) => parseInt(part, 10));
  const numbers = parts.length === 2 ? [...parts, 0] : parts.slice(0, 3);
  let version = numbers.join(".");
  if (match[5] !== undefined) version += ` build ${parseInt(match[5], 10)}`;

  const published =
    match[2] !== undefined
      ? `${match[4]}-${pad2(match[3])}-${pad2(match[2])}`
      : "unknown";
  return { version, published };
}

/**
 * Releases listed in the history page that are newer than `deployed`,
 * in page order (newest first).
 */
export function parseReleaseHistory(html: string, deployed: string): ReleaseNote[] {
  const $ = cheerio.load(html);
  const releases: ReleaseNote[] = [];
  let current: { version: string; published: string } | null = null;

  for (const child of $("div#content ul.bullets").first().children().toArray()) {
    const item = $(child);
    if (item.is("li")) {
      const release = parseReleaseTitle(item.text());
      current =
        release !== null && compareVersionIds(release.version, deployed) === 1
          ? release
          : null;
    } else if (item.is("ul.bullets2") && current !== null) {
      const notes = item
        .children("li")
        .toArray()
        .map((li) => `<li>${escapeHtml($(li).text().trim())}</li>`)
        .join("");
      releases.push({ ...current, notes: `<ul>${notes}</ul>` });
      current = null;
    }
  }
  return releases;
}

export function formatChangeSummary(releases: ReleaseNote[]): string {
  const items = releases
    .map((r) => `<li>version ${r.version} published on ${r.published}</li>${r.notes}`)
    .join("");
  return `<ul>${items}</ul>`;
}

export class MakeMkvProduct extends BaseProduct {
  constructor() {
    super();
    this.name = "MakeMKV";
    this.target = "unified";
    this.web_site_location = "https://www.makemkv.com/";
    this.release_note_location = HISTORY_URL;
    this.silent_inst_args = "/S";
  }

  async getOrigin(ctx: ProductContext): Promise<void> {
    const deployed = this.version;
    ctx.logger.info({ since: deployed }, "Fetching the latest product information");

    const xml = await retrieveText(PAD_URL, {
      allowInsecure: ctx.allowInsecure,
      timeoutMs: ctx.timeoutMs,
      logger: ctx.logger,
    });
    const pad = XmlDocument.parse(xml, PAD_URL);
    if (!pad.has("XML_DIZ_INFO")) {
      throw new TrackerFailure("HANDLER_ERROR", `Erroneous PAD file at ${PAD_URL}`);
    }
    const field = (path: string): string => pad.text(`XML_DIZ_INFO/${path}`) ?? "";

    const name = field("Program_Info/Program_Name");
    const version = field("Program_Info/Program_Version");
    if (!name || !version) {
      throw new TrackerFailure(
        "HANDLER_ERROR",
        `The PAD file at ${PAD_URL} names no program or version`,
      );
    }

    this.name = name;
    this.version = version;
    this.display_name = `${name} v${version}`;
    this.published = releaseDate(
      field("Program_Info/Program_Release_Year"),
      field("Program_Info/Program_Release_Month"),
      field("Program_Info/Program_Release_Day"),
    );
    this.description = field("Program_Descriptions/English/Char_Desc_250");
    this.editor = field("Company_Info/Company_Name");
    this.location = field("Web_Info/Download_URLs/Primary_Download_URL");
    this.icon = field("Web_Info/Application_URLs/Application_Icon_URL");
    this.change_summary = await this.changeSummary(deployed, ctx);
    this.file_size = -1;
    this.secure_hash = null;

    ctx.logger.info(
      { version: this.version, published: this.published },
      "Latest product information fetched",
    );
  }

  /** Change summary since `deployed`; a placeholder when the history is unavailable. */
  private async changeSummary(deployed: string, ctx: ProductContext): Promise<string> {
    try {
      const html = await retrieveText(this.release_note_location, {
        allowInsecure: ctx.allowInsecure,
        timeoutMs: ctx.timeoutMs,
        logger: ctx.logger,
      });
      return formatChangeSummary(parseReleaseHistory(html, deployed));
    } catch (err: unknown) {
      if (!(err instanceof TrackerFailure)) throw err;
      ctx.logger.warn({ err: err.message }, NO_CHANGE_LOG);
      return NO_CHANGE_LOG;
    }
  }
}

/** PAD release date as a catalog timestamp, "" when it is not a real date. */
export function releaseDate(year: string, month: string, day: string): string {
  if (!/^\d{4}$/.test(year) || !/^\d{1,2}$/.test(month) || !/^\d{1,2}$/.test(day)) {
    return "";
  }
  const timestamp = `${year}-${pad2(month)}-${pad2(day)}T00:00:00`;
  return isWellFormedTimestamp(timestamp) ? timestamp : "";
}
