import { FINES } from '../constants.js';
import type { Action, BinState, DayType, Decision, FineReason } from './types.js';

export function fineFor(reasons: readonly FineReason[]): number {
  return reasons.reduce((sum, reason) => sum + FINES[reason], 0);
}

/**
 * Reflex policy for one location. The bin flags are already relative to the
 * day being collected, so the day type does not change the decision.
 *
 * | scheduled | contaminated | action  | fine |
 * |-----------|--------------|---------|------|
 * | yes       | yes          | collect | 200  |
 * | yes       | no           | collect | 0    |
 * | no        | yes          | skip    | 200  |
 * | no        | no           | skip    | 100  |
 */
export function decide(_dayType: DayType, bin: BinState): Decision {
  const action: Action = bin.hasScheduledWaste ? 'collect' : 'skip';
  let fineReasons: FineReason[];
  if (bin.isContaminated) fineReasons = ['contamination']; // replaces the uncollected fine
  else if (!bin.hasScheduledWaste) fineReasons = ['uncollected'];
  else fineReasons = [];
  return Object.freeze({ action, fineAmount: fineFor(fineReasons), fineReasons: Object.freeze(fineReasons) });
}
