#!/usr/bin/env node
import { realpathSync } from 'fs';
import { createInterface } from 'readline/promises';
import { fileURLToPath } from 'url';
import { parseArgs } from 'util';
import type { Readable } from 'stream';
import { CONFIG } from './constants.js';
import { InvalidConfigurationError } from './errors.js';
import { parseDayType, parseLocationCount, parseSeed } from './filters.js';
import { logger } from './logger.js';
import { simulate, summarize } from './simulation/engine.js';
import { formatLog, formatSummary } from './simulation/report.js';
import type { DayType, SimulationOptions } from './simulation/types.js';

export type Ask = (question: string) => Promise<string>;
export type Print = (line: string) => void;

export async function promptDayType(ask: Ask, print: Print): Promise<DayType> {
  print('Which waste collector? Garbage or Recycle');
  for (;;) {
    const day = parseDayType(await ask('> '));
    if (day) return day;
    print("Please type 'Garbage' or 'Recycle'.");
  }
}

export async function promptLocationCount(ask: Ask, print: Print): Promise<number> {
  print('How many locations?');
  const n = parseLocationCount(await ask('> '));
  if (n !== undefined) return n;
  print(`Invalid number (1-${CONFIG.MAX_LOCATIONS}). Defaulting to ${CONFIG.DEFAULT_LOCATIONS}.`);
  return CONFIG.DEFAULT_LOCATIONS;
}

/** Returns undefined when no flags were given, meaning interactive mode. */
export function parseFlags(argv: string[]): SimulationOptions | undefined {
  let values: { day?: string; locations?: string; seed?: string };
  try {
    ({ values } = parseArgs({
      args: argv,
      options: {
        day: { type: 'string', short: 'd' },
        locations: { type: 'string', short: 'n' },
        seed: { type: 'string', short: 's' },
      },
    }));
  } catch (err) {
    throw new InvalidConfigurationError(err instanceof Error ? err.message : String(err));
  }
  if (values.day === undefined && values.locations === undefined && values.seed === undefined) return undefined;

  const dayType = parseDayType(values.day ?? '');
  if (!dayType) throw new InvalidConfigurationError(`--day must be garbage or recycle, got '${values.day ?? ''}'`);
  const locations = values.locations === undefined ? CONFIG.DEFAULT_LOCATIONS : parseLocationCount(values.locations);
  if (locations === undefined) throw new InvalidConfigurationError(`--locations must be an integer from 1 to ${CONFIG.MAX_LOCATIONS}, got '${values.locations}'`);
  const seed = values.seed === undefined ? CONFIG.DEFAULT_SEED : parseSeed(values.seed);
  if (seed === undefined) throw new InvalidConfigurationError(`--seed must be an integer, got '${values.seed}'`);
  return { dayType, locations, seed };
}

export function render(options: SimulationOptions, print: Print) {
  const result = simulate(options);
  print(`--- Running ${result.dayType} collection ---`);
  print(`Locations: 1 .. ${result.locationCount}`);
  print('');
  for (const line of formatLog(result)) print(line);
  print('');
  print('--- Summary ---');
  for (const line of formatSummary(result, summarize(result))) print(line);
  return result;
}

/** Reads answers line by line, so piped input is never dropped between prompts. */
export function lineReader(input: Readable, print: Print) {
  const rl = createInterface({ input, crlfDelay: Infinity });
  const lines = rl[Symbol.asyncIterator]();
  const ask: Ask = async (question) => {
    print(question);
    const next = await lines.next();
    if (next.done) throw new InvalidConfigurationError('input ended before all answers were given');
    return next.value;
  };
  return { ask, close: () => rl.close() };
}

export async function main(argv: string[], print: Print = line => console.log(line), input: Readable = process.stdin): Promise<number> {
  try {
    let options = parseFlags(argv);
    if (!options) {
      const { ask, close } = lineReader(input, print);
      try {
        const dayType = await promptDayType(ask, print);
        const locations = await promptLocationCount(ask, print);
        options = { dayType, locations, seed: CONFIG.DEFAULT_SEED };
      } finally {
        close();
      }
    }
    const result = render(options, print);
    logger.debug({ dayType: result.dayType, locations: result.locationCount, totalFines: result.totalFines }, 'simulation finished');
    return 0;
  } catch (err) {
    if (err instanceof InvalidConfigurationError) {
      logger.error({ code: err.code }, err.message);
      return 1;
    }
    throw err;
  }
}

if (process.argv[1] && realpathSync(process.argv[1]) === fileURLToPath(import.meta.url)) {
  main(process.argv.slice(2)).then(code => { process.exitCode = code; }).catch(err => {
    logger.fatal(err);
    process.exit(1);
  });
}
