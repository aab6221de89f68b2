/**
 * CLI module for the BeReal export tool
 */

import cliProgress from 'cli-progress';
import { Command } from 'commander';
import ora from 'ora';
import { buildConfig, DEFAULT_BEREAL_PATH, DEFAULT_OUTPUT_DIR, DEFAULT_WORKERS, type RawExportOptions } from './config.js';
import { describeCriterion } from './date-filter.js';
import { exitCodeFor, exportArchive, formatSummary } from './exporter.js';
import { createDeferredLogger, createLogger, errorMessage } from './logger.js';
import { ExifToolWriter, type MetadataWriter } from './metadata.js';
import { CATEGORIES, ConfigurationError, type ExportConfig } from './types.js';

/**
 * Check if running in interactive mode (no arguments, or -i/--interactive)
 */
export function shouldRunInteractive(argv: readonly string[]): boolean {
  // argv[0] = node, argv[1] = script path
  const args = argv.slice(2);
  return args.length === 0 || args.includes('-i') || args.includes('--interactive');
}

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('bereal-export')
    .description('Export BeReal memories, posts, realmojis and conversations with dates and GPS')
    .version('1.0.0')
    .option('-v, --verbose', 'Explain what is being done', false)
    .option('-i, --interactive', 'Run in interactive mode with guided prompts', false)
    .option(
      '-t, --timespan <range>',
      "Export the given timespan, format 'DD.MM.YYYY-DD.MM.YYYY'; either side may be '*'"
    )
    .option('-y, --year <year>', 'Export the given year')
    .option('-p, --out-path <dir>', 'Output directory', DEFAULT_OUTPUT_DIR)
    .option('--bereal-path <dir>', 'Path to the BeReal export folder', DEFAULT_BEREAL_PATH)
    .option('--exiftool-path <path>', "Path to the ExifTool executable (if it isn't the bundled one)")
    .option('--timezone <zone>', 'Fallback IANA timezone when GPS is missing (default: this machine)')
    .option('--no-gps-timezone', 'Always use the fallback timezone instead of the GPS location')
    .option('-j, --workers <n>', 'Number of files processed in parallel', String(DEFAULT_WORKERS))
    .option('--composite', 'Also write a merged front/back image for memories and posts', false)
    .option('--memories', 'Require memories')
    .option('--no-memories', "Don't export memories")
    .option('--posts', 'Require posts')
    .option('--no-posts', "Don't export posts")
    .option('--realmojis', 'Require realmojis')
    .option('--no-realmojis', "Don't export realmojis")
    .option('--conversations', 'Require conversations')
    .option('--no-conversations', "Don't export conversations")
    .option('--all-realmojis', 'Include realmojis that were not taken instantly', false)
    .option('--dry-run', 'Show what would be exported without writing files', false)
    .action(async (options: RawExportOptions) => {
      process.exitCode = await runExport(options);
    });

  return program;
}

/**
 * The spinner only animates on an interactive terminal, and not while
 * verbose or dry-run output is being printed
 */
export function spinnerEnabled(config: Pick<ExportConfig, 'verbose' | 'dryRun'>, isTTY: boolean): boolean {
  return !config.verbose && !config.dryRun && isTTY;
}

function printPlan(config: ExportConfig): void {
  const categories = CATEGORIES.filter((category) => config.categories[category] !== 'off');
  console.log(`  Export folder: ${config.berealPath}`);
  console.log(`  Output: ${config.outputDir}`);
  console.log(`  Categories: ${categories.join(', ')}`);
  console.log(`  Dates: ${describeCriterion(config.dateCriterion)}`);
  console.log(
    `  Timezone: ${config.useGpsTimezone ? 'from GPS, fallback ' : ''}${config.fallbackTimezone}`
  );
  console.log(`  Workers: ${config.workers}`);
  if (config.composite) {
    console.log('  Compositing: enabled');
  }
  console.log();
}

/**
 * Main export execution, shared by the CLI and interactive mode.
 * Returns the process exit code.
 */
export async function runExport(
  raw: RawExportOptions,
  createWriter: (config: ExportConfig) => MetadataWriter = (config) =>
    new ExifToolWriter({ exiftoolPath: config.exiftoolPath, maxProcs: config.workers })
): Promise<number> {
  let config: ExportConfig;
  try {
    config = buildConfig(raw);
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    return 1;
  }

  printPlan(config);

  const logger = createDeferredLogger(createLogger(config.verbose));
  const showProgress = !config.verbose && !config.dryRun && process.stdout.isTTY === true;
  let progressStarted = false;
  const spinner = ora({
    text: 'Reading BeReal export...',
    isEnabled: spinnerEnabled(config, process.stderr.isTTY === true),
  }).start();
  const progressBar = new cliProgress.SingleBar(
    {
      format: 'Exporting |{bar}| {percentage}% | {value}/{total} | ETA: {eta_formatted}',
      hideCursor: true,
    },
    cliProgress.Presets.shades_classic
  );
  const writer = createWriter(config);

  try {
    const summary = await exportArchive(config, {
      writer,
      logger,
      onJobsPlanned: (total) => {
        spinner.succeed(`Found ${total} files to export`);
        if (showProgress && total > 0) {
          progressBar.start(total, 0);
          progressStarted = true;
          logger.hold();
        }
      },
      onJobComplete: () => {
        if (progressStarted) {
          progressBar.increment();
        }
      },
    });
    if (progressStarted) {
      progressBar.stop();
    }
    logger.release();
    if (spinner.isSpinning) {
      spinner.stop();
    }

    console.log();
    console.log(config.dryRun ? 'Dry run complete.' : 'Export complete!');
    console.log(formatSummary(summary));
    return config.dryRun ? 0 : exitCodeFor(summary);
  } catch (error) {
    if (progressStarted) {
      progressBar.stop();
    }
    logger.release();
    spinner.fail('Export failed');
    console.error(
      error instanceof ConfigurationError ? `Error: ${error.message}` : errorMessage(error)
    );
    return 1;
  } finally {
    await writer.close();
  }
}
