#!/usr/bin/env node
import { Command } from 'commander';
import path from 'path';
import pc from 'picocolors';
import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ConnectionFlags, loadSyncConfig } from '../config/config.js';
import { loadSelection } from '../config/selection.js';
import { isExecutable } from '../core/executor.js';
import { SyncOrchestrator } from '../core/orchestrator.js';
import { SchemaExporter } from '../utils/exporter.js';
import { logger } from '../utils/logger.js';
import { SQLWriter } from '../writer/writer.js';
import { confirmApply, promptSelection } from './prompt.js';
import { printAnalysis, printPreview, printSelectionSummary, printWarnings } from './report.js';

interface CompareOptions extends ConnectionFlags {
  output?: string | boolean;
}

interface SyncOptions extends ConnectionFlags {
  selection?: string;
  outputDir: string;
  baseName: string;
  apply?: boolean;
}

function addConnectionOptions(command: Command): Command {
  return command
    .option('-c, --config <file>', 'JSON file with { engine?, source, target } connection settings')
    .option('-e, --engine <engine>', 'Database engine: mysql | mariadb')
    // Source DB Options
    .option('--s-host <string>', 'Source database host')
    .option('--s-port <number>', 'Source database port')
    .option('--s-db <string>', 'Source database name')
    .option('--s-user <string>', 'Source database user')
    .option('--s-pass <string>', 'Source database password')
    // Target DB Options
    .option('--t-host <string>', 'Target database host')
    .option('--t-port <number>', 'Target database port')
    .option('--t-db <string>', 'Target database name')
    .option('--t-user <string>', 'Target database user')
    .option('--t-pass <string>', 'Target database password');
}

function fail(error: unknown) {
  if (error instanceof z.ZodError) {
    logger.error({ errors: error.issues }, 'Invalid configuration');
  } else {
    logger.error(error, 'Error during execution');
  }
  process.exitCode = 1;
}

function resolveOutput(output: string | boolean, source: string, target: string): string {
  if (output === true) {
    return path.join(process.cwd(), 'files', 'comparisons', `comparison_${source}_vs_${target}.xlsx`);
  }
  const requested = String(output);
  return path.isAbsolute(requested) ? requested : path.join(process.cwd(), 'files', 'comparisons', requested);
}

export async function runCli(argv: string[] = process.argv) {
  const program = new Command();

  program
    .name('schemasync')
    .description('Compare two MariaDB/MySQL schemas and generate a migration plan')
    .version('1.0.0');

  addConnectionOptions(
    program
      .command('compare')
      .description('Compare source and target schemas and list the differences')
      .option('-o, --output [file]', 'Export the comparison (e.g. results.xlsx or results.csv)')
  ).action(async (options: CompareOptions) => {
    let orchestrator: SyncOrchestrator | undefined;
    try {
      const config = await loadSyncConfig(options);
      orchestrator = SyncOrchestrator.connect(config);

      const snapshot = await orchestrator.compare();
      printAnalysis(snapshot.result);
      printWarnings(snapshot.warnings);

      if (options.output) {
        await SchemaExporter.exportToSheet(
          snapshot.result,
          resolveOutput(options.output, snapshot.source.database, snapshot.target.database)
        );
      }
    } catch (error) {
      fail(error);
    } finally {
      await orchestrator?.close();
    }
  });

  addConnectionOptions(
    program
      .command('sync')
      .description('Choose an action per table and generate structure and data scripts')
      .option('-s, --selection <file>', 'JSON file mapping table names to actions; prompts when omitted')
      .option('-o, --output-dir <dir>', 'Directory for the generated scripts', path.join(process.cwd(), 'files', 'sync'))
      .option('-b, --base-name <name>', 'File name prefix of the generated scripts', 'sync_database')
      .option('--apply', 'Execute the structure script on the target without asking')
  ).action(async (options: SyncOptions) => {
    let orchestrator: SyncOrchestrator | undefined;
    try {
      const config = await loadSyncConfig(options);
      orchestrator = SyncOrchestrator.connect(config);

      const snapshot = await orchestrator.compare();
      printAnalysis(snapshot.result);
      printWarnings(snapshot.warnings);

      const interactive = !options.selection;
      const selection = options.selection
        ? await loadSelection(options.selection)
        : await promptSelection(snapshot.result, snapshot.source, snapshot.target);

      if (!selection) {
        logger.info('No selection made; nothing generated');
        return;
      }

      printSelectionSummary(selection);

      const scripts = orchestrator.plan(snapshot, selection);
      printWarnings(scripts.warnings);

      const written = await orchestrator.write(scripts, new SQLWriter(options.outputDir, options.baseName));
      if (written.structurePath) console.log(`\n${pc.green('Structure SQL saved to:')} ${written.structurePath}`);
      if (written.dataPath) console.log(`${pc.green('Data SQL saved to:')} ${written.dataPath}`);

      const commands = scripts.structure.filter(isExecutable);
      printPreview(commands);

      const apply = options.apply || (interactive && commands.length > 0 && (await confirmApply(config.target.database, commands.length)));
      if (!apply) return;

      const report = await orchestrator.apply(scripts);
      console.log(`\n${report.status === 'succeeded' ? pc.green('Applied') : pc.red('Applied with errors:')} ${report.executed} commands executed, ${report.failures.length} failed`);
      report.failures.forEach(failure => console.log(`   ${pc.red('✗')} ${failure.message}`));
      if (report.status === 'failed') process.exitCode = 1;
    } catch (error) {
      fail(error);
    } finally {
      await orchestrator?.close();
    }
  });

  await program.parseAsync(argv);
}

// Resolved so the npm bin symlink counts as a direct start.
const isMain = process.argv[1] && fileURLToPath(import.meta.url) === realpathSync(process.argv[1]);

if (isMain) {
  runCli().catch(error => {
    logger.error(error, 'Unexpected failure');
    process.exit(1);
  });
}
