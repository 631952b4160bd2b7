import { pino } from 'pino';
import { CONFIG } from './constants.js';

export const logger = pino({ name: 'waste-collector', level: CONFIG.LOG_LEVEL });
