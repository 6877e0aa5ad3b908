/**
 * apptrack Engine — XML helpers for product handlers
 *
 * Thin layer over fast-xml-parser: parse once, then read text and
 * attributes along slash-separated paths ("Program_Info/Program_Name").
 * Values are kept as strings; "1.10" must not become the number 1.1.
 */

import { XMLParser, XMLValidator } from "fast-xml-parser";
import { TrackerFailure } from "../errors";

const ATTRIBUTE_PREFIX = "@_";

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

export class XmlDocument {
  private constructor(private readonly root: unknown) {}

  /**
   * Parse an XML document. Throws a HANDLER_ERROR TrackerFailure when the
   * text is not well-formed XML.
   */
  static parse(xml: string, source: string): XmlDocument {
    const valid = XMLValidator.validate(xml);
    if (valid !== true) {
      throw new TrackerFailure(
        "HANDLER_ERROR",
        `Malformed XML document at ${source}: ${valid.err.msg} (line ${valid.err.line})`,
        { source },
      );
    }
    return new XmlDocument(parser.parse(xml));
  }

  /** Node at `path`; the first element is taken where a tag repeats. */
  node(path: string): unknown {
    let current: unknown = this.root;
    for (const part of path.split("/").filter(Boolean)) {
      if (Array.isArray(current)) current = current[0];
      if (!isRecord(current)) return undefined;
      current = current[part];
    }
    return Array.isArray(current) ? current[0] : current;
  }

  /** Text content at `path`, null when the element is absent. */
  text(path: string): string | null {
    const node = this.node(path);
    if (typeof node === "string") return node;
    if (typeof node === "number" || typeof node === "boolean") return String(node);
    if (isRecord(node)) {
      const inner = node["#text"];
      return typeof inner === "string" ? inner : "";
    }
    return null;
  }

  /** Value of attribute `name` of the element at `path`. */
  attribute(path: string, name: string): string | null {
    const node = this.node(path);
    if (!isRecord(node)) return null;
    const value = node[`${ATTRIBUTE_PREFIX}${name}`];
    return typeof value === "string" ? value : null;
  }

  /** Whether an element exists at `path`. */
  has(path: string): boolean {
    return this.node(path) !== undefined;
  }
}
