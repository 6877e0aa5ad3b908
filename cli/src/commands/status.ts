/**
 * apptrack CLI — Status Command
 *
 * Shows, for every application, the release recorded at each stage of
 * the catalog.
 *
 * Usage:
 *   apptrack status
 */

import { Command } from 'commander';
import { CatalogDocument, CatalogStore, getProduct, Stage } from '@apptrack/catalog';
import { createDefaultRegistry, loadConfig, TrackerConfig } from '@apptrack/engine';
import { GlobalOptions, resolveConfigPath } from '../config';
import {
  colors,
  formatBytes,
  printConfigIssues,
  printError,
  printInfo,
  printTable,
  truncateText,
} from '../output';

const ID_WIDTH = 24;

function stageVersion(catalog: CatalogDocument, appId: string, stage: Stage): string {
  const product = getProduct(catalog, appId, stage);
  return product ? colors.version(product.version) : colors.dim('-');
}

function approvedSize(catalog: CatalogDocument, appId: string): string {
  const product = getProduct(catalog, appId, 'approved');
  return product ? formatBytes(product.file_size) : colors.dim('-');
}

/**
 * One row per configured application, then one per application that is
 * only left in the catalog.
 */
export function statusRows(config: TrackerConfig, catalog: CatalogDocument): string[][] {
  const row = (id: string, tracking: string) => [
    colors.app(truncateText(id, ID_WIDTH)),
    stageVersion(catalog, id, 'pulled'),
    stageVersion(catalog, id, 'fetched'),
    stageVersion(catalog, id, 'approved'),
    approvedSize(catalog, id),
    tracking,
  ];

  const configured = new Set(config.applications.map((app) => app.id));
  const rows = config.applications.map((app) =>
    row(app.id, app.enabled ? colors.success('on') : colors.dim('off')),
  );
  for (const id of Object.keys(catalog.products).sort()) {
    if (!configured.has(id)) rows.push(row(id, colors.warn('not configured')));
  }
  return rows;
}

export function showStatus(globals: GlobalOptions): number {
  const loaded = loadConfig(resolveConfigPath(globals.config), createDefaultRegistry());
  if (!loaded.ok) {
    printConfigIssues(loaded.file, loaded.issues);
    return 1;
  }

  const catalog = new CatalogStore(loaded.config.store).load();
  if (!catalog.ok) {
    printError(`${catalog.message} (${catalog.path})`);
    for (const error of catalog.errors) {
      console.error(`  ${colors.dim(error.path)}: ${error.message}`);
    }
    return 1;
  }
  if (catalog.created) {
    printInfo(`No catalog yet in ${loaded.config.store}.`);
    printInfo(`Run ${colors.bold('apptrack pull')} to get started.`);
    return 0;
  }

  if (catalog.catalog.modified) {
    printInfo(`Catalog modified on ${catalog.catalog.modified}\n`);
  }
  printTable({
    head: ['Application', 'Pulled', 'Fetched', 'Approved', 'Size', 'Tracking'],
    rows: statusRows(loaded.config, catalog.catalog),
  });
  return 0;
}

export function registerStatusCommand(program: Command): void {
  program
    .command('status')
    .description('Show the releases recorded in the catalog')
    .action(() => {
      process.exitCode = showStatus(program.opts<GlobalOptions>());
    });
}
