import type { SetEntry, AggregationSummary } from '../types/plays';

export const PLAYS_MARKER = '🎧';
export const SETS_MARKER = '🎶';

// Exact halves go to the even tenth. Only quotients ending in .25 or .75 are exact halves in binary.
function toOneDecimal(value: number): string {
  const isExactHalf = Number.isInteger(value * 4) && !Number.isInteger(value * 2);
  if (!isExactHalf) return value.toFixed(1);
  const tenths = Math.floor(value * 10);
  return ((tenths % 2 === 0 ? tenths : tenths + 1) / 10).toFixed(1);
}

export function formatPlays(n: number): string {
  if (n >= 1_000_000) return `${toOneDecimal(n / 1_000_000)}M`;
  if (n >= 1_000) return `${toOneDecimal(n / 1_000)}k`;
  return String(n);
}

export function formatSetLine(entry: SetEntry, plays: number): string {
  if (!entry.link) return entry.rawLine;
  const base = `* [${entry.name}](${entry.link})`;
  return plays > 0 ? `${base} _//_ ${formatPlays(plays)}${PLAYS_MARKER}` : base;
}

export function formatSummary(summary: AggregationSummary): string[] {
  return [
    '',
    `Total plays: **${formatPlays(summary.totalPlays)}${PLAYS_MARKER}**`,
    `Total amount of sets: **${summary.totalSets}${SETS_MARKER}**`,
  ];
}

const MAGNITUDE: Record<string, number> = { k: 1_000, M: 1_000_000 };

// Reads both plain counts ("2500🎧") and formatted ones ("2.5k🎧")
export function parsePlaysAnnotation(line: string): number {
  const m = /([0-9]+(?:\.[0-9]+)?)([kM]?)🎧/u.exec(line);
  if (!m || !m[1]) return 0;
  const value = Number(m[1]);
  if (!Number.isFinite(value)) return 0;
  return Math.round(value * (MAGNITUDE[m[2] ?? ''] ?? 1));
}
