// Input parsing for day type, location count and seed. Raw text never reaches the simulation.
import { CONFIG } from './constants.js';
import type { DayType } from './simulation/types.js';

function clean(input: string): string {
  return input.normalize('NFKC').trim().toLowerCase();
}

/** Accepts "Garbage", "recycle", "g", "R" and so on. */
export function parseDayType(input: string): DayType | undefined {
  const text = clean(input);
  if (text.startsWith('g')) return 'garbage';
  if (text.startsWith('r')) return 'recycle';
  return undefined;
}

export function parseLocationCount(input: string, max = CONFIG.MAX_LOCATIONS): number | undefined {
  const text = clean(input);
  if (!/^\+?\d+$/.test(text)) return undefined;
  const n = Number(text);
  return Number.isSafeInteger(n) && n > 0 && n <= max ? n : undefined;
}

export function parseSeed(input: string): number | undefined {
  const text = clean(input);
  if (!/^[+-]?\d+$/.test(text)) return undefined;
  const n = Number(text);
  return Number.isSafeInteger(n) ? n : undefined;
}
