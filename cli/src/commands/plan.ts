/**
 * apptrack CLI — Plan Command
 *
 * Shows what a deployment would do on a machine: which installers of an
 * applist it would run, given the applications already installed.
 *
 * Usage:
 *   apptrack plan store/applist-office.txt --inventory installed.yaml
 *   apptrack plan applist-all.txt --inventory installed.json --arch x86
 *
 * The inventory lists the installed applications, either as a
 * `name: version` map or as a list of { name, version }.
 */

import * as fs from "fs";
import { Command, Option } from "commander";
import {
  Architecture,
  DeploymentStep,
  InstalledApplication,
  loadInventory,
  parseApplist,
  planDeployment,
} from "@apptrack/engine";
import { colors, formatAction, printError, printInfo, printTable, printWarn } from "../output";

export function defaultArchitecture(): Architecture {
  return process.arch === "ia32" ? "x86" : "x64";
}

export function planRows(steps: DeploymentStep[]): string[][] {
  return steps.map(({ entry, action, installed }) => [
    colors.app(entry.display_name),
    entry.target,
    colors.version(entry.version),
    installed ? installed.version : colors.dim("-"),
    formatAction(action),
  ]);
}

export interface PlanOptions {
  inventory: string;
  arch: Architecture;
}

export function planCommand(applistFile: string, opts: PlanOptions): number {
  let text: string;
  let inventory: InstalledApplication[];
  try {
    text = fs.readFileSync(applistFile, "utf-8");
  } catch (err: unknown) {
    printError(`Cannot read the applist: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
  try {
    inventory = loadInventory(opts.inventory);
  } catch (err: unknown) {
    printError(`Cannot read the inventory: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }

  const { entries, issues } = parseApplist(text);
  for (const issue of issues) {
    printWarn(`${applistFile}:${issue.line}: ${issue.message}`);
  }

  const steps = planDeployment(entries, inventory, opts.arch);
  printTable({
    head: ["Product", "Target", "Version", "Installed", "Action"],
    rows: planRows(steps),
  });

  const toRun = steps.filter((s) => s.action === "install" || s.action === "upgrade").length;
  printInfo(`${colors.bold(String(toRun))} installer(s) to run on ${opts.arch}`);
  return 0;
}

export function registerPlanCommand(program: Command): void {
  program
    .command("plan <applist>")
    .description("Show what deploying an applist would do on a machine")
    .requiredOption("-i, --inventory <file>", "Installed applications (YAML or JSON)")
    .addOption(
      new Option("--arch <arch>", "Machine architecture")
        .choices(["x86", "x64"])
        .default(defaultArchitecture()),
    )
    .action((applist: string, opts: PlanOptions) => {
      process.exitCode = planCommand(applist, opts);
    });
}
