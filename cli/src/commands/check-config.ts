/**
 * apptrack CLI — Check Config Command
 *
 * Validates the configuration file and shows what it resolves to.
 *
 * Usage:
 *   apptrack check-config
 *   apptrack -c other.yaml check-config
 */

import { Command } from "commander";
import { createDefaultRegistry, loadConfig, TrackerConfig } from "@apptrack/engine";
import { GlobalOptions, resolveConfigPath } from "../config";
import { colors, printConfigIssues, printDetail, printSuccess, printTable } from "../output";

export function applicationRows(config: TrackerConfig): string[][] {
  return config.applications.map((app) => [
    colors.app(app.id),
    app.handler,
    app.enabled ? colors.success("on") : colors.dim("off"),
    app.set,
    app.applists.join(", "),
  ]);
}

export function checkConfig(globals: GlobalOptions): number {
  const file = resolveConfigPath(globals.config);
  const loaded = loadConfig(file, createDefaultRegistry());
  if (!loaded.ok) {
    printConfigIssues(loaded.file, loaded.issues);
    return 1;
  }

  const config = loaded.config;
  printSuccess(`Configuration ${colors.bold(file)} is valid`);
  printDetail("Store", config.store);
  printDetail("Applists", config.applists.join(", ") || colors.dim("(none)"));
  printDetail(
    "Reports",
    config.reports ? `${config.reports.directory} (${config.reports.format})` : colors.dim("(none)"),
  );
  console.log();
  printTable({
    head: ["Application", "Handler", "Tracking", "Set", "Applists"],
    rows: applicationRows(config),
  });
  return 0;
}

export function registerCheckConfigCommand(program: Command): void {
  program
    .command("check-config")
    .description("Validate the configuration file")
    .action(() => {
      process.exitCode = checkConfig(program.opts<GlobalOptions>());
    });
}
