#!/usr/bin/env node
import 'dotenv/config';

import path from 'path';
import { Command, CommanderError, InvalidArgumentError } from 'commander';
import logger from './util/logger';
import { loadConfig } from './util/config';
import { describeError } from './util/errors';
import { parseRiotId, resolveRouting, RiotId } from './api/riot';
import { JsonlFileStore } from './store';
import { scrape, ProgressHook } from './scraper';

export interface PlayerArgument extends RiotId {
  region: string;
  /** The Riot ID as typed, `gameName#tagLine`. */
  player: string;
}

interface CliOptions {
  output?: string;
  append: boolean;
  withTimeline: boolean;
  queue?: number;
  type?: string;
  startTime?: number;
  endTime?: number;
  maxMatches?: number;
  config?: string;
}

export function parsePlayerArgument(value: string): PlayerArgument {
  const separator = value.indexOf(':');
  const region = separator === -1 ? '' : value.slice(0, separator).trim();
  const player = value.slice(separator + 1).trim();

  if (!region || !player) {
    throw new InvalidArgumentError(`Expected <region>:<gameName#tagLine>, got "${value}".`);
  }

  try {
    resolveRouting(region);
    return { region, player, ...parseRiotId(player) };
  } catch (e) {
    throw new InvalidArgumentError(e instanceof Error ? e.message : String(e));
  }
}

function parseCount(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Not a non-negative integer.');
  }
  return parsed;
}

function parsePositiveCount(value: string): number {
  const parsed = parseCount(value);
  if (parsed === 0) {
    throw new InvalidArgumentError('Must be at least 1.');
  }
  return parsed;
}

export function defaultOutputPath(directory: string, riotId: RiotId): string {
  const safe = (part: string) => part.replace(/[\\/:*?"<>|\s]+/g, '_');
  return path.join(directory, `${safe(riotId.gameName)}-${safe(riotId.tagLine)}.jsonl`);
}

function stopAfter(maxMatches: number): ProgressHook {
  return (event) => {
    if (event.type === 'match' && event.stored >= maxMatches) {
      logger.info(`Reached --max-matches ${maxMatches}, stopping.`);
      return false;
    }
  };
}

async function runScrape(apiKey: string, target: PlayerArgument, options: CliOptions): Promise<void> {
  const config = loadConfig(options.config);
  const destination = options.output ?? defaultOutputPath(config.output.directory, target);

  const store = await JsonlFileStore.open({ destination, append: options.append });
  try {
    const summary = await scrape(store, apiKey, target.region, target.player, {
      withTimeline: options.withTimeline,
      settings: config.riot,
      filter: {
        queue: options.queue,
        type: options.type,
        startTime: options.startTime,
        endTime: options.endTime,
      },
      onProgress: options.maxMatches === undefined ? undefined : stopAfter(options.maxMatches),
    });

    logger.info(`${summary.stored} matches written to ${destination} (${store.size} total).`);
  } finally {
    await store.close();
  }
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('riot-match-scraper')
    .description('Download the match history of a League of Legends player as JSON Lines')
    .version('1.0.0')
    .argument('<apiKey>', 'Riot API key')
    .argument('<player>', 'Player as <region>:<gameName#tagLine>, e.g. euw1:Someone#EUW', parsePlayerArgument)
    .option('--output <file>', 'Output file (default: <gameName>-<tagLine>.jsonl)')
    .option('--append', 'Recognize matches already in the output file and append new ones', false)
    .option('--with-timeline', 'Also download the timeline of every match', false)
    .option('--queue <id>', 'Only list matches of this queue id', parseCount)
    .option('--type <type>', 'Only list matches of this type (ranked, normal, tourney, tutorial)')
    .option('--start-time <epochSeconds>', 'Only list matches played after this time', parseCount)
    .option('--end-time <epochSeconds>', 'Only list matches played before this time', parseCount)
    .option('--max-matches <n>', 'Stop after storing this many new matches', parsePositiveCount)
    .option('--config <file>', 'Path to a YAML configuration file')
    .exitOverride()
    .action(runScrape);

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  try {
    await buildProgram().parseAsync(argv);
  } catch (error) {
    // Commander has already printed usage errors, help and the version.
    if (error instanceof CommanderError) {
      process.exitCode = error.exitCode;
      return;
    }
    const message = error instanceof Error ? error.message : String(error);
    logger.error({ err: error, ...describeError(error) }, `Scrape failed: ${message}`);
    process.exitCode = 1;
  }
}

if (require.main === module) {
  void main();
}
