export type DayType = 'garbage' | 'recycle';

export const DAY_TYPES: readonly DayType[] = ['garbage', 'recycle'];

// Both flags are relative to the day being collected.
export interface BinState {
  readonly hasScheduledWaste: boolean; // waste of today's type
  readonly isContaminated: boolean; // waste of the other type
}

export type Action = 'collect' | 'skip';

export type FineReason = 'uncollected' | 'contamination';

export interface Decision {
  readonly action: Action;
  readonly fineAmount: number;
  readonly fineReasons: readonly FineReason[];
}

export interface Outcome extends Decision {
  readonly locationIndex: number; // 1-based
}

export interface SimulationResult {
  readonly dayType: DayType;
  readonly locationCount: number;
  readonly outcomes: readonly Outcome[];
  readonly totalFines: number;
}

export interface SimulationSummary {
  collected: number;
  skipped: number;
  uncollectedLocations: number[];
  contaminationLocations: number[];
  fineUncollected: number;
  fineContamination: number;
  totalFines: number;
}

export interface BinProbabilities {
  scheduledWaste: number;
  contamination: number;
}

export interface SimulationOptions {
  dayType: DayType;
  locations: number;
  seed?: number;
  probabilities?: Partial<BinProbabilities>;
}
