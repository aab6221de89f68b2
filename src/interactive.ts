/**
 * Interactive CLI module for guided user experience
 */

import { checkbox, confirm, input, select } from '@inquirer/prompts';
import { access, readdir, stat } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { DEFAULT_OUTPUT_DIR, DEFAULT_WORKERS, type RawExportOptions } from './config.js';
import { parseTimespan } from './date-filter.js';
import { CONVERSATIONS_DIR, MANIFEST_FILES } from './parser.js';
import { hostTimezone, isValidTimezone } from './timezone.js';
import { CATEGORIES, type Category } from './types.js';

/**
 * Worker count presets
 */
export interface WorkerPreset {
  readonly name: string;
  readonly workers: number;
  readonly description: string;
}

const PRESET_KEYS = ['normal', 'fast', 'sequential'] as const;

export const WORKER_PRESETS: Record<(typeof PRESET_KEYS)[number], WorkerPreset> = {
  sequential: { name: 'Sequential', workers: 1, description: 'One file at a time' },
  normal: { name: 'Normal', workers: DEFAULT_WORKERS, description: 'Recommended' },
  fast: { name: 'Fast', workers: 8, description: 'For fast disks' },
};

/**
 * Common locations to search for BeReal exports
 */
function getSearchLocations(): string[] {
  const home = homedir();
  return [process.cwd(), join(home, 'Downloads'), join(home, 'Desktop'), home];
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Categories with data in an export folder
 */
export async function detectCategories(berealPath: string): Promise<Category[]> {
  const found: Category[] = [];
  for (const category of CATEGORIES) {
    const path =
      category === 'conversations'
        ? join(berealPath, CONVERSATIONS_DIR)
        : join(berealPath, MANIFEST_FILES[category]);
    if (await pathExists(path)) {
      found.push(category);
    }
  }
  return found;
}

/**
 * Search the common locations and their direct subfolders for exports
 */
async function findBerealExports(): Promise<string[]> {
  const found = new Set<string>();

  for (const location of getSearchLocations()) {
    const candidates = [location];
    try {
      const entries = await readdir(location, { withFileTypes: true });
      for (const entry of entries) {
        if (entry.isDirectory() && !entry.name.startsWith('.')) {
          candidates.push(join(location, entry.name));
        }
      }
    } catch {
      continue;
    }

    for (const candidate of candidates) {
      if ((await detectCategories(candidate)).length > 0) {
        found.add(candidate);
      }
    }
  }

  return [...found];
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(resolve(path.trim()))).isDirectory();
  } catch {
    return false;
  }
}

function printBanner(): void {
  console.log();
  console.log('===========================================');
  console.log('          BeReal Export Tool               ');
  console.log('===========================================');
  console.log();
}

async function promptExportPath(): Promise<{ path: string; categories: Category[] } | null> {
  console.log('  Searching for BeReal exports...');
  const foundExports = await findBerealExports();

  if (foundExports.length > 0) {
    console.log(`  Found ${foundExports.length} export${foundExports.length > 1 ? 's' : ''}!`);
    console.log();

    const selected = await select({
      message: 'Select a BeReal export:',
      choices: [
        ...foundExports.map((path) => ({ name: path, value: path })),
        { name: 'Enter a different path...', value: '__manual__' },
      ],
    });

    if (selected !== '__manual__') {
      return { path: selected, categories: await detectCategories(selected) };
    }
  } else {
    console.log('  No exports found in common locations.');
    console.log();
  }

  for (;;) {
    const entered = await input({
      message: 'Path to your BeReal export folder:',
      validate: async (value) => {
        if (!value.trim()) return 'Please enter a path';
        return (await isDirectory(value)) || 'Path does not exist or is not a directory';
      },
    });

    const path = resolve(entered.trim());
    const categories = await detectCategories(path);
    if (categories.length > 0) {
      return { path, categories };
    }

    console.log('  No memories.json, posts.json, realmojis.json or conversations/ found there.');
    const tryAgain = await confirm({ message: 'Try a different path?', default: true });
    if (!tryAgain) {
      return null;
    }
  }
}

async function promptDateFilter(): Promise<Pick<RawExportOptions, 'timespan' | 'year'>> {
  const mode = await select({
    message: 'Which dates should be exported?',
    choices: [
      { name: 'Everything', value: 'all' as const },
      { name: 'A single year', value: 'year' as const },
      { name: 'A timespan', value: 'timespan' as const },
    ],
    default: 'all',
  });

  if (mode === 'year') {
    const year = await input({
      message: 'Year:',
      default: String(new Date().getFullYear()),
      validate: (value) => /^\d{4}$/.test(value.trim()) || 'Please enter a four-digit year',
    });
    return { year: year.trim() };
  }

  if (mode === 'timespan') {
    const timespan = await input({
      message: 'Timespan (DD.MM.YYYY-DD.MM.YYYY, * for an open end):',
      validate: (value) => {
        try {
          parseTimespan(value);
          return true;
        } catch (error) {
          return error instanceof Error ? error.message : 'Invalid timespan';
        }
      },
    });
    return { timespan: timespan.trim() };
  }

  return {};
}

/**
 * Run the interactive prompts and return raw export options
 */
export async function runInteractivePrompts(): Promise<RawExportOptions | null> {
  printBanner();

  const exportFolder = await promptExportPath();
  if (!exportFolder) {
    return null;
  }

  console.log();
  console.log(`  Found: ${exportFolder.categories.join(', ')}`);
  console.log();

  const selected = await checkbox({
    message: 'Categories to export:',
    choices: exportFolder.categories.map((category) => ({
      name: category,
      value: category,
      checked: true,
    })),
    required: true,
  });

  const outPath = await input({ message: 'Output directory:', default: DEFAULT_OUTPUT_DIR });
  const dates = await promptDateFilter();

  const gpsTimezone = await confirm({
    message: 'Use GPS location to pick the timezone of each photo?',
    default: true,
  });

  const timezone = await input({
    message: 'Timezone for photos without GPS:',
    default: hostTimezone(),
    validate: (value) => isValidTimezone(value.trim()) || 'Unknown IANA timezone',
  });

  const canComposite = selected.includes('memories') || selected.includes('posts');
  const composite = canComposite
    ? await confirm({ message: 'Also create merged front/back images?', default: false })
    : false;

  const presetKey = await select({
    message: 'Speed:',
    choices: PRESET_KEYS.map((key) => ({
      name: `${WORKER_PRESETS[key].name} - ${WORKER_PRESETS[key].workers} parallel (${WORKER_PRESETS[key].description})`,
      value: key,
    })),
    default: 'normal',
  });

  console.log();
  console.log('-------------------------------------------');
  console.log('  Summary');
  console.log('-------------------------------------------');
  console.log(`  Export: ${exportFolder.path}`);
  console.log(`  Categories: ${selected.join(', ')}`);
  console.log(`  Output: ${resolve(outPath)}`);
  console.log(`  Dates: ${dates.year ?? dates.timespan ?? 'all'}`);
  console.log(`  Timezone: ${gpsTimezone ? 'from GPS, fallback ' : ''}${timezone.trim()}`);
  console.log(`  Composite images: ${composite ? 'Yes' : 'No'}`);
  console.log('-------------------------------------------');
  console.log();

  const proceed = await confirm({ message: 'Start export?', default: true });
  if (!proceed) {
    console.log('  Export cancelled.');
    return null;
  }

  const enabled = (category: Category): boolean | undefined =>
    selected.includes(category) ? undefined : false;

  return {
    berealPath: exportFolder.path,
    outPath,
    ...dates,
    gpsTimezone,
    timezone: timezone.trim(),
    composite,
    workers: WORKER_PRESETS[presetKey].workers,
    memories: enabled('memories'),
    posts: enabled('posts'),
    realmojis: enabled('realmojis'),
    conversations: enabled('conversations'),
  };
}
