import { FINES } from '../constants.js';
import { InvalidConfigurationError } from '../errors.js';
import { type BinGenerator, RandomBinGenerator } from './generator.js';
import { decide } from './policy.js';
import type { DayType, Outcome, SimulationOptions, SimulationResult, SimulationSummary } from './types.js';

export function runSimulation(dayType: DayType, locationCount: number, generator: BinGenerator): SimulationResult {
  if (!Number.isInteger(locationCount) || locationCount < 1) {
    throw new InvalidConfigurationError(`locationCount must be a positive integer, got ${locationCount}`);
  }
  const outcomes: Outcome[] = [];
  let totalFines = 0;
  for (let locationIndex = 1; locationIndex <= locationCount; locationIndex++) {
    const bin = generator.generate();
    const decision = decide(dayType, bin);
    outcomes.push(Object.freeze({ locationIndex, ...decision }));
    totalFines += decision.fineAmount;
  }
  return Object.freeze({ dayType, locationCount, outcomes: Object.freeze(outcomes), totalFines });
}

/** Unseeded runs draw from Math.random. */
export function simulate(options: SimulationOptions): SimulationResult {
  const generator = options.seed === undefined
    ? new RandomBinGenerator(Math.random, options.probabilities)
    : RandomBinGenerator.seeded(options.seed, options.probabilities);
  return runSimulation(options.dayType, options.locations, generator);
}

export function summarize(result: SimulationResult): SimulationSummary {
  const summary: SimulationSummary = {
    collected: 0,
    skipped: 0,
    uncollectedLocations: [],
    contaminationLocations: [],
    fineUncollected: 0,
    fineContamination: 0,
    totalFines: result.totalFines,
  };
  for (const o of result.outcomes) {
    if (o.action === 'collect') summary.collected++; else summary.skipped++;
    if (o.fineReasons.includes('uncollected')) summary.uncollectedLocations.push(o.locationIndex);
    if (o.fineReasons.includes('contamination')) summary.contaminationLocations.push(o.locationIndex);
  }
  summary.fineUncollected = summary.uncollectedLocations.length * FINES.uncollected;
  summary.fineContamination = summary.contaminationLocations.length * FINES.contamination;
  return summary;
}
