#!/usr/bin/env node

/**
 * CLI router - Commander.js subcommands for dataset-unpublish
 *
 * `unpublish` takes the registry operation from --operation; `retract` and `delete` preset it.
 * Each subcommand delegates to src/commands/unpublish.ts.
 */

import { Command, program } from 'commander';
import * as dotenv from 'dotenv';
import { parseIntegerOption } from './utils/cli-helpers.js';

dotenv.config();

interface CliOptions {
  file?: string;
  operation: string;
  datasetVersion?: number;
  serving: boolean;
  discovery: boolean;
  deleteLocal: boolean;
  allVersions: boolean;
  republish: boolean;
  compositeIds: boolean;
  dryRun: boolean;
  force: boolean;
  output: string;
  verbose: boolean;
}

function registerUnpublishCommand(name: string, description: string, presetOperation?: string): Command {
  const cmd = program
    .command(name)
    .argument('[datasets...]', 'Dataset names, optionally suffixed with #<version>')
    .description(description)
    .option('--file <path>', 'Excel/CSV file with Dataset and Version columns')
    .option('--dataset-version <n>', 'Version for names given without #<version> (-1 = all)', parseIntegerOption)
    .option('--no-serving', 'Do not prune serving-layer catalogs')
    .option('--discovery', 'Reinitialize the discovery service after pruning', false)
    .option('--delete-local', 'Delete the dataset records from the local catalog', false)
    .option('--all-versions', 'Delete every version of each dataset', false)
    .option('--republish', 'List versions that become latest and should be republished', false)
    .option('--composite-ids', 'Identifiers have the form master_id.vN|data_node', false)
    .option('--dry-run', 'Resolve and preview without changing anything', false)
    .option('-f, --force', 'Skip confirmation prompt (for CI/scripts)', false)
    .option('-o, --output <dir>', 'Output directory for reports', './reports')
    .option('-v, --verbose', 'Enable verbose logging', false);

  if (!presetOperation) {
    cmd.option('--operation <op>', 'Registry operation: delete, retract or none', 'retract');
  }

  cmd.action(async (datasets: string[], opts: CliOptions) => {
    if (datasets.length === 0 && !opts.file) {
      cmd.help();
    }
    const { unpublishCommand } = await import('./commands/unpublish.js');
    process.exitCode = await unpublishCommand(datasets, {
      file: opts.file,
      operation: presetOperation ?? opts.operation,
      version: opts.datasetVersion,
      serving: opts.serving,
      discovery: opts.discovery,
      deleteLocal: opts.deleteLocal,
      allVersions: opts.allVersions,
      republish: opts.republish,
      compositeIds: opts.compositeIds,
      dryRun: opts.dryRun,
      force: opts.force,
      output: opts.output,
      verbose: opts.verbose,
    });
  });

  return cmd;
}

program
  .name('dataset-unpublish')
  .description('Retract or delete published datasets from the registry, serving layer and local catalog')
  .version('1.0.0');

registerUnpublishCommand('unpublish', 'Unpublish datasets (operation chosen with --operation)');
registerUnpublishCommand('retract', 'Retract datasets from the registry', 'retract');
registerUnpublishCommand('delete', 'Delete datasets from the registry', 'delete');

await program.parseAsync();
