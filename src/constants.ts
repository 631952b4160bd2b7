function envNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  return Number.isFinite(value) ? value : fallback;
}

export const CONFIG = {
  PORT: envNumber('PORT', 3000),
  HOST: process.env.HOST || '0.0.0.0',
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
  SCHEDULED_WASTE_P: envNumber('SCHEDULED_WASTE_P', 0.6),
  CONTAMINATION_P: envNumber('CONTAMINATION_P', 0.25),
  DEFAULT_LOCATIONS: envNumber('DEFAULT_LOCATIONS', 20),
  DEFAULT_SEED: envNumber('DEFAULT_SEED', 25),
  MAX_LOCATIONS: envNumber('MAX_LOCATIONS', 10000),
};

export const FINES = {
  uncollected: 100,
  contamination: 200,
} as const;

export const RATE_LIMIT = {
  max: 60,
  timeWindow: '1 minute',
};

export function defaultProbabilities() {
  return { scheduledWaste: CONFIG.SCHEDULED_WASTE_P, contamination: CONFIG.CONTAMINATION_P };
}
