/**
 * Tolerant numeric parsing for data cells.
 * Blank or non-numeric text becomes MISSING; parsing never throws.
 */

import { MISSING, type Cell } from './dataset.types.js';

const DECIMAL_RE = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;
const INFINITY_RE = /^([+-]?)inf(inity)?$/i;

export function parseNumericCell(raw: string | undefined): Cell {
  if (raw === undefined) return MISSING;

  const text = raw.trim();
  if (!text) return MISSING;

  const inf = INFINITY_RE.exec(text);
  if (inf) {
    return inf[1] === '-' ? -Infinity : Infinity;
  }

  if (!DECIMAL_RE.test(text)) return MISSING;

  const value = Number(text);
  return Number.isNaN(value) ? MISSING : value;
}
