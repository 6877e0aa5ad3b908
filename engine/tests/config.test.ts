/**
 * apptrack Engine — Configuration Tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { ALL_SET, loadConfig, parseConfig, splitApplists } from "../src/config";
import { createDefaultRegistry } from "../src/products/registry";

const TEST_DIR = path.join(os.tmpdir(), "apptrack-config-test");
const BASE_DIR = "/srv/apptrack";
const registry = createDefaultRegistry();

const VALID = `
core:
  store: store
sets:
  desk: all, office
  lab: [all, lab]
applications:
  firefox:
    handler: firefox-win64
    set: desk
  makemkv: true
  dummy: false
`;

function parse(text: string) {
  return parseConfig(text, "", registry, BASE_DIR);
}

function issuesOf(text: string) {
  const result = parse(text);
  return result.ok ? [] : result.issues;
}

// ────────────────────────────────────────────────────────────────
// splitApplists
// ────────────────────────────────────────────────────────────────

describe("splitApplists", () => {
  it("splits a comma-separated string", () => {
    expect(splitApplists(" all ,office")).toEqual(["all", "office"]);
  });

  it("trims the names of a list", () => {
    expect(splitApplists([" lab "])).toEqual(["lab"]);
  });

  it("returns null when a name is empty", () => {
    expect(splitApplists("all,,office")).toBeNull();
  });
});

// ────────────────────────────────────────────────────────────────
// parseConfig
// ────────────────────────────────────────────────────────────────

describe("parseConfig", () => {
  it("resolves a valid configuration", () => {
    const result = parse(VALID);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const { config } = result;

    expect(config.store).toBe("/srv/apptrack/store");
    expect(config.logLevel).toBe("silent");
    expect(config.allowInsecure).toBe(false);
    expect(config.timeoutMs).toBe(60000);
    expect(config.reports).toBeNull();
    expect(config.sets).toEqual({ desk: ["all", "office"], lab: ["all", "lab"] });
    expect(config.applists).toEqual(["all", "lab", "office"]);
    expect(config.applications.map((app) => app.id)).toEqual(["firefox", "makemkv", "dummy"]);
  });

  it("resolves each application", () => {
    const result = parse(VALID);
    if (!result.ok) throw new Error("expected a valid configuration");
    const [firefox, makemkv, dummy] = result.config.applications;

    expect(firefox).toEqual({
      id: "firefox",
      enabled: true,
      handler: "firefox-win64",
      path: "/srv/apptrack/store/firefox",
      set: "desk",
      applists: ["all", "office"],
    });
    expect(makemkv.handler).toBe("makemkv");
    expect(makemkv.set).toBe(ALL_SET);
    expect(makemkv.applists).toEqual(["all", "lab", "office"]);
    expect(dummy.enabled).toBe(false);
  });

  it("reads core settings, reports and download paths", () => {
    const result = parse(`
core:
  store: /var/store
  log_level: debug
  allow_insecure: true
  timeout: 30
reports:
  directory: reports
sets: {}
applications:
  dummy:
    path: downloads/dummy
  makemkv:
`);
    if (!result.ok) throw new Error("expected a valid configuration");
    const { config } = result;

    expect(config.store).toBe("/var/store");
    expect(config.logLevel).toBe("debug");
    expect(config.allowInsecure).toBe(true);
    expect(config.timeoutMs).toBe(30000);
    expect(config.reports).toEqual({ directory: "/srv/apptrack/reports", format: "html" });
    expect(config.applists).toEqual([]);
    expect(config.applications[0].path).toBe("/srv/apptrack/downloads/dummy");
    expect(config.applications[1].enabled).toBe(true);
  });

  it("reports every missing section", () => {
    expect(issuesOf("").map((issue) => issue.path)).toEqual(["core", "sets", "applications"]);
    expect(issuesOf("sets: {}\napplications: {}")).toEqual([
      {
        path: "core",
        message: 'Section "core" is missing',
        solution: 'Add a "core" section to the configuration file',
      },
    ]);
  });

  it("rejects unknown handlers with the known ones", () => {
    expect(issuesOf("core: {store: s}\nsets: {}\napplications: {foo: true}")).toEqual([
      {
        path: "applications.foo.handler",
        message: 'Unknown handler "foo"',
        solution: "Use one of: dummy, firefox-win, firefox-win64, makemkv, thunderbird-win",
      },
    ]);
  });

  it("rejects undeclared sets", () => {
    const issues = issuesOf("core: {store: s}\nsets: {}\napplications: {dummy: {set: lab}}");
    expect(issues).toEqual([
      {
        path: "applications.dummy.set",
        message: 'Set "lab" is not declared',
        solution: 'Declare "lab" in the sets section',
      },
    ]);
  });

  it("rejects the reserved set name and empty applist names", () => {
    const issues = issuesOf(
      `core: {store: s}\nsets: {${ALL_SET}: all, desk: "all, "}\napplications: {}`,
    );
    expect(issues.map((issue) => [issue.path, issue.message])).toEqual([
      [`sets.${ALL_SET}`, `"${ALL_SET}" is reserved`],
      ["sets.desk", "An applist name is empty"],
    ]);
  });

  it("rejects application ids the catalog cannot hold", () => {
    const issues = issuesOf(
      'core: {store: s}\nsets: {}\napplications: {"my app": {handler: dummy}, "../x": {handler: dummy}}',
    );
    const solution =
      "Start the id with a letter or digit and use only letters, digits, '.', '_' and '-'";
    expect(issues).toEqual([
      { path: "applications.my app", message: '"my app" is not a valid application id', solution },
      { path: "applications.../x", message: '"../x" is not a valid application id', solution },
    ]);
  });

  it("rejects unknown application options", () => {
    const issues = issuesOf("core: {store: s}\nsets: {}\napplications: {dummy: {colour: red}}");
    expect(issues).toHaveLength(1);
    expect(issues[0].path).toBe("applications.dummy");
  });

  it("rejects invalid YAML", () => {
    const issues = issuesOf("core: [");
    expect(issues).toHaveLength(1);
    expect(issues[0].path).toBe("(root)");
    expect(issues[0].message).toMatch(/^Invalid YAML: /);
  });
});

// ────────────────────────────────────────────────────────────────
// loadConfig
// ────────────────────────────────────────────────────────────────

describe("loadConfig", () => {
  beforeEach(() => {
    fs.mkdirSync(TEST_DIR, { recursive: true });
  });

  afterEach(() => {
    fs.rmSync(TEST_DIR, { recursive: true, force: true });
  });

  it("resolves paths against the directory of the file", () => {
    const file = path.join(TEST_DIR, "apptrack.yaml");
    fs.writeFileSync(file, VALID, "utf-8");

    const result = loadConfig(file, registry);
    if (!result.ok) throw new Error("expected a valid configuration");
    expect(result.config.file).toBe(file);
    expect(result.config.store).toBe(path.join(TEST_DIR, "store"));
  });

  it("reports an unreadable file", () => {
    const file = path.join(TEST_DIR, "missing.yaml");
    const result = loadConfig(file, registry);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.file).toBe(file);
    expect(result.issues[0].path).toBe("(file)");
    expect(result.issues[0].message).toMatch(/^Cannot read the configuration file: /);
  });
});
