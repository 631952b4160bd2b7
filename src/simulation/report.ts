import { FINES } from '../constants.js';
import type { DayType, SimulationResult, SimulationSummary } from './types.js';

function otherType(day: DayType): DayType {
  return day === 'garbage' ? 'recycle' : 'garbage';
}

export function formatLog(result: SimulationResult): string[] {
  const { dayType, outcomes } = result;
  const lines = outcomes.map(o => o.action === 'collect'
    ? `[step ${o.locationIndex}] Collected ${dayType} at location ${o.locationIndex}.`
    : `[step ${o.locationIndex}] No ${dayType} at location ${o.locationIndex}, moving on.`);
  // Inspection runs after the route: uncollected fines first, then contamination.
  for (const o of outcomes) {
    if (o.fineReasons.includes('uncollected')) {
      lines.push(`[inspection] Fine $${FINES.uncollected} at location ${o.locationIndex} for uncollected ${dayType}.`);
    }
  }
  for (const o of outcomes) {
    if (o.fineReasons.includes('contamination')) {
      lines.push(`[inspection] Fine $${FINES.contamination} at location ${o.locationIndex} for contamination (${dayType}-bin has ${otherType(dayType)}).`);
    }
  }
  return lines;
}

function listOrNone(locations: number[]) {
  return locations.length ? locations.join(', ') : 'none';
}

export function formatSummary(result: SimulationResult, summary: SimulationSummary): string[] {
  return [
    `Day type: ${result.dayType}`,
    `Locations: ${result.locationCount}`,
    `Collected: ${summary.collected}`,
    `Skipped: ${summary.skipped}`,
    `Uncollected fines: $${summary.fineUncollected} (locations: ${listOrNone(summary.uncollectedLocations)})`,
    `Contamination fines: $${summary.fineContamination} (locations: ${listOrNone(summary.contaminationLocations)})`,
    `Total fines: $${summary.totalFines}`,
  ];
}
