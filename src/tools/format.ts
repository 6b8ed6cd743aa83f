/**
 * Text helpers shared by the tool summaries
 */

import type { UnitSystem } from '../domain/types.js';

export interface UnitLabels {
  temperature: string;
  speed: string;
  precipitation: string;
  visibility: string;
}

const LABELS: Record<UnitSystem, UnitLabels> = {
  m: { temperature: '°C', speed: 'km/h', precipitation: 'mm', visibility: 'km' },
  i: { temperature: '°F', speed: 'mph', precipitation: 'in', visibility: 'mi' },
};

export function unitLabels(unit: UnitSystem): UnitLabels {
  return LABELS[unit];
}

/**
 * "1 warning", "2 warnings"
 */
export function plural(count: number, noun: string, pluralNoun = `${noun}s`): string {
  return `${count} ${count === 1 ? noun : pluralNoun}`;
}
