/**
 * Split Command
 * 
 * Partition an archive's Packages/Sources indices by size and write one
 * index set per partition.
 */

import ora, { type Ora } from 'ora';
import {
  CapacitySequence,
  ConfigurationError,
  Partitioner,
  isDebsliceError,
  loadArchive,
  parseIncludeList,
  selectPackages,
} from '@debslice/core';
import { Emitter } from '@debslice/mirror';
import { createLogger, safeReadFile } from '@debslice/utils';
import { config } from '../config/index.js';
import { printError, printInfo, printJson, printLines, printSkipped, printSuccess } from '../lib/output.js';
import { createLoggingObserver, describePlan, planToJson } from '../lib/report.js';
import { resolveSplitSettings, type SplitCommandOptions, type SplitSettings } from '../lib/settings.js';

async function readIncludeFile(file: string): Promise<string[]> {
  const content = await safeReadFile(file);
  if (content === null) {
    throw new ConfigurationError('include-from', `Include file not found: ${file}`);
  }
  return parseIncludeList(content);
}

export async function splitCommand(
  source: string,
  dest: string,
  options: SplitCommandOptions
): Promise<void> {
  let settings: SplitSettings;
  try {
    settings = resolveSplitSettings(source, dest, options, config.defaults);
  } catch (error) {
    printError(error instanceof Error ? error.message : 'Unknown error');
    process.exit(1);
  }

  const log = createLogger({ command: 'split' });
  const observer = createLoggingObserver(log);
  const spinner = ora({ text: 'Reading archive indices...', isEnabled: !settings.json }).start();
  // Spinner still running, if any; a failure stops it
  let active: Ora | undefined = spinner;

  try {
    const includeFrom = settings.includeFrom ? await readIncludeFile(settings.includeFrom) : [];

    const archive = await loadArchive({
      root: settings.source,
      ...settings.scope,
      sources: settings.sourceMode !== 'none',
      onRead: (file, entries) => {
        spinner.text = `Reading ${file}... ${entries} entries`;
      },
    });
    spinner.succeed(
      `Read ${archive.packages.count} packages and ${archive.sources.count} sources`
    );
    active = undefined;

    const names = selectPackages(
      archive.packages,
      { include: settings.include, includeFrom },
      (warning) => observer.warning?.(warning)
    );

    const partitioner = new Partitioner(archive.packages, archive.sources, {
      capacities: new CapacitySequence(settings.capacities, (warning) => observer.warning?.(warning)),
      sourceCapacities: new CapacitySequence(settings.sourceCapacities, (warning) => observer.warning?.(warning)),
      sourceMode: settings.sourceMode,
      maxPartitions: settings.limit,
      ignoreOversized: settings.ignoreOversized,
      observer,
    });
    const plan = partitioner.run(names);

    if (settings.json) {
      printJson(planToJson(plan, settings.naming));
    } else {
      printLines(describePlan(plan, settings.naming));
      printSkipped(plan.skipped);
      if (plan.truncated) {
        printInfo(`Partition limit ${settings.limit} reached; remaining packages were left out`);
      }
    }

    if (settings.dryRun) {
      return;
    }

    const writer = ora({ text: 'Writing partition indices...', isEnabled: !settings.json }).start();
    active = writer;
    const emitter = new Emitter({
      dest: settings.dest,
      scope: settings.scope,
      naming: settings.naming,
      packageDocuments: archive.packageDocuments,
      sourceDocuments: archive.sourceDocuments,
      onWrite: (written) => {
        writer.text = `Writing ${written.file}... ${written.count}`;
      },
    });
    const result = await emitter.emit(plan);

    if (!result.success) {
      writer.fail('Writing failed');
      printError(result.error ?? 'Unknown error');
      process.exit(1);
    }
    writer.stop();
    active = undefined;
    if (!settings.json) {
      printSuccess(`Wrote ${result.files.length} index files under ${settings.dest}`);
    }
  } catch (error) {
    active?.fail('Split failed');
    if (isDebsliceError(error)) {
      printError(`Error!: ${error.message}`);
    } else {
      log.error({ err: error }, 'Unexpected failure');
      printError(error instanceof Error ? error.message : 'Unknown error');
    }
    process.exit(1);
  }
}
