/**
 * apptrack Engine — Dummy product
 *
 * Static release, no network access. Useful to try a configuration and
 * as the smallest example of a handler.
 */

import { formatTimestamp } from "@apptrack/catalog";
import { BaseProduct, ProductContext } from "./base-product";

export const DUMMY_VERSION = "1.0.1";

export class DummyProduct extends BaseProduct {
  constructor() {
    super();
    this.name = "Dummy Product";
  }

  async getOrigin(ctx: ProductContext): Promise<void> {
    ctx.logger.info(
      { since: this.version },
      "Fetching the latest product information",
    );

    this.name = "Dummy Product";
    this.version = DUMMY_VERSION;
    this.display_name = `${this.name} v${this.version}`;
    this.published = formatTimestamp(ctx.now());
    this.target = "unified";
    this.description = "A trivial example of a product handler.";
    this.editor = "Example Inc.";
    this.web_site_location = "http://www.example.com/index.html";
    this.location = "http://www.example.com/dist.zip";
    this.icon = "";
    this.announce_location = "http://www.example.com/news.txt";
    this.feed_location = "http://www.example.com/feed.rss";
    this.release_note_location = "http://www.example.com/release_note.txt";
    this.change_summary =
      "<ul><li>version 1.0.0 published on 2016-02-02</li>" +
      "<ul><li>a dummy feature</li><li>Small miscellaneous improvements and bugfixes</li></ul>" +
      "<li>version 0.1.0 published on 2015-02-02</li><ul><li>initial commit</li></ul></ul>";
    this.file_size = -1;
    this.secure_hash = null;
    this.std_inst_args = "";
    this.silent_inst_args = "/silent";
  }
}
