import seedrandom from 'seedrandom';
import { defaultProbabilities } from '../constants.js';
import { InvalidConfigurationError } from '../errors.js';
import type { BinProbabilities, BinState } from './types.js';

export interface BinGenerator {
  generate(): BinState;
}

export type RandomSource = () => number;

function checkProbability(name: string, p: number) {
  if (!Number.isFinite(p) || p < 0 || p > 1) {
    throw new InvalidConfigurationError(`${name} probability must be between 0 and 1, got ${p}`);
  }
}

export class RandomBinGenerator implements BinGenerator {
  private readonly probabilities: BinProbabilities;

  constructor(private readonly rng: RandomSource = Math.random, probabilities?: Partial<BinProbabilities>) {
    this.probabilities = { ...defaultProbabilities(), ...probabilities };
    checkProbability('scheduledWaste', this.probabilities.scheduledWaste);
    checkProbability('contamination', this.probabilities.contamination);
  }

  static seeded(seed: number, probabilities?: Partial<BinProbabilities>): RandomBinGenerator {
    return new RandomBinGenerator(seedrandom(String(seed)), probabilities);
  }

  generate(): BinState {
    // two independent draws, in this order
    const hasScheduledWaste = this.rng() < this.probabilities.scheduledWaste;
    const isContaminated = this.rng() < this.probabilities.contamination;
    return Object.freeze({ hasScheduledWaste, isContaminated });
  }
}

/** Replays a fixed sequence of bins, starting over when it runs out. */
export class FixtureBinGenerator implements BinGenerator {
  private readonly bins: readonly BinState[];
  private next = 0;

  constructor(bins: readonly BinState[]) {
    if (bins.length === 0) throw new InvalidConfigurationError('fixture needs at least one bin');
    this.bins = bins.map(b => Object.freeze({ ...b }));
  }

  generate(): BinState {
    const bin = this.bins[this.next % this.bins.length];
    this.next++;
    return bin;
  }
}
