/**
 * apptrack Engine — Mozilla products
 *
 * Firefox and Thunderbird releases are looked up on the Mozilla
 * application update service (AUS): given the deployed version and build
 * id, it answers with an update.xml naming the next release, or with an
 * empty <updates/> when the deployed release is the latest.
 *
 * The platform, build id and locale are kept in `extra` so that the next
 * query starts from the approved release.
 */

import { isWellFormedTimestamp, Target } from "@apptrack/catalog";
import { retrieveText } from "../downloader";
import { TrackerFailure } from "../errors";
import { BaseProduct, ProductContext } from "./base-product";
import { XmlDocument } from "./xml";

export type MozillaPlatform = "win" | "win64";

interface BuildTarget {
  /** AUS build target */
  build: string;
  target: Target;
}

export const BUILD_TARGETS: Record<MozillaPlatform, BuildTarget> = {
  win: { build: "WINNT_x86-msvc", target: "x86" },
  win64: { build: "WINNT_x86_64-msvc-x64", target: "x64" },
};

const AUS_SERVER = "aus5.mozilla.org";
const DOWNLOAD_SERVER = "download.mozilla.org";

export interface MozillaDefaults {
  name: string;
  platform: MozillaPlatform;
  /** Version and build id the very first query starts from */
  version: string;
  buildId: string;
  locale: string;
  description: string;
  webSite: string;
}

export const FIREFOX_WIN: MozillaDefaults = {
  name: "firefox",
  platform: "win",
  version: "42.0",
  buildId: "20151029151421",
  locale: "fr",
  description:
    "Firefox is a free and open-source web browser available under the Mozilla Public License",
  webSite: "https://www.mozilla.org/firefox",
};

export const FIREFOX_WIN64: MozillaDefaults = { ...FIREFOX_WIN, platform: "win64" };

export const THUNDERBIRD_WIN: MozillaDefaults = {
  name: "thunderbird",
  platform: "win",
  version: "1.0",
  buildId: "0",
  locale: "fr",
  description:
    "Thunderbird is a free and open-source email client available under the Mozilla Public License",
  webSite: "https://www.mozilla.org/thunderbird",
};

function isPlatform(value: string | undefined): value is MozillaPlatform {
  return value === "win" || value === "win64";
}

/** "20151029151421" → "2015-10-29T15:14:21"; null unless it names a real instant */
export function buildIdToTimestamp(buildId: string): string | null {
  const match = /^(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})(\d{2})$/.exec(buildId);
  if (!match) return null;
  const [, y, mo, d, h, mi, s] = match;
  const timestamp = `${y}-${mo}-${d}T${h}:${mi}:${s}`;
  return isWellFormedTimestamp(timestamp) ? timestamp : null;
}

export class MozillaProduct extends BaseProduct {
  constructor(defaults: MozillaDefaults) {
    super();
    this.name = defaults.name;
    this.version = defaults.version;
    this.target = BUILD_TARGETS[defaults.platform].target;
    this.description = defaults.description;
    this.editor = "Mozilla Foundation";
    this.web_site_location = defaults.webSite;
    this.silent_inst_args = "-ms";
    this.extra = {
      platform: defaults.platform,
      build_id: defaults.buildId,
      locale: defaults.locale,
    };
  }

  get platform(): MozillaPlatform {
    const value = this.extra.platform;
    if (!isPlatform(value)) {
      throw new TrackerFailure("HANDLER_ERROR", `${value} is not a supported platform`);
    }
    return value;
  }

  get buildId(): string {
    return this.extra.build_id ?? "";
  }

  get locale(): string {
    return this.extra.locale ?? "";
  }

  /** AUS query for the deployed release. */
  updateUrl(): string {
    const { build } = BUILD_TARGETS[this.platform];
    if (!this.name || !this.version || !this.buildId || !this.locale) {
      throw new TrackerFailure(
        "HANDLER_ERROR",
        "Name, version, build id and locale are required to query the update service",
      );
    }
    return (
      `https://${AUS_SERVER}/update/6/${this.name}/${this.version}/${this.buildId}/${build}` +
      `/${this.locale}/release/Windows_NT%206.1/%20/default/default/update.xml?force=1`
    );
  }

  async getOrigin(ctx: ProductContext): Promise<void> {
    const url = this.updateUrl();
    ctx.logger.info({ since: this.version, url }, "Fetching the latest product information");

    const xml = await retrieveText(url, {
      allowInsecure: ctx.allowInsecure,
      timeoutMs: ctx.timeoutMs,
      logger: ctx.logger,
    });
    const doc = XmlDocument.parse(xml, url);

    const version = doc.attribute("updates/update", "appVersion");
    if (version === null) {
      ctx.logger.info({ product: this.name, version: this.version }, "No available update");
      return;
    }

    const buildId = doc.attribute("updates/update", "buildID") ?? "";
    const published = buildIdToTimestamp(buildId);
    if (published === null) {
      throw new TrackerFailure("HANDLER_ERROR", `Unexpected build id "${buildId}" in ${url}`);
    }

    const platform = this.platform;
    const displayTarget = BUILD_TARGETS[platform].target;
    this.version = version;
    this.extra = { ...this.extra, build_id: buildId };
    this.release_note_location = doc.attribute("updates/update", "detailsURL") ?? "";
    this.location =
      `https://${DOWNLOAD_SERVER}/?product=${this.name}-${version}` +
      `&os=${platform}&lang=${this.locale}`;
    const product = this.name.charAt(0).toUpperCase() + this.name.slice(1);
    this.display_name = `Mozilla ${product} ${version} (${displayTarget} ${this.locale})`;
    this.published = published;
    this.change_summary = "";
    this.file_size = -1;
    this.secure_hash = null;
    this.std_inst_args = "";
    this.silent_inst_args = "-ms";

    ctx.logger.info(
      { version: this.version, published: this.published },
      "Latest product information fetched",
    );
  }
}
