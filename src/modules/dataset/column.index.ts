/**
 * Column Index
 *
 * Header name → position lookup. The header carries two identity columns
 * before the numeric features, so a raw header position is translated into a
 * matrix offset by toMatrixOffset() and nowhere else.
 */

import { ColumnNotFoundError } from '../../common/errors.js';

export const IDENTITY_COLUMN_COUNT = 2;

export function toMatrixOffset(rawIndex: number): number {
  return rawIndex - IDENTITY_COLUMN_COUNT;
}

export class ColumnIndex {
  private readonly positions: ReadonlyMap<string, number>;

  constructor(header: readonly string[]) {
    const positions = new Map<string, number>();
    // Repeated header names: last occurrence wins
    header.forEach((name, i) => positions.set(name, i));
    this.positions = positions;
  }

  /**
   * Raw header position of a name, identity columns included
   */
  rawIndex(name: string): number | undefined {
    return this.positions.get(name);
  }

  has(name: string): boolean {
    const raw = this.positions.get(name);
    return raw !== undefined && raw >= IDENTITY_COLUMN_COUNT;
  }

  /**
   * Matrix offset of a numeric feature.
   * Throws ColumnNotFoundError for unknown names and for the identity columns.
   */
  resolve(name: string): number {
    const raw = this.positions.get(name);
    if (raw === undefined) {
      throw new ColumnNotFoundError(name);
    }
    if (raw < IDENTITY_COLUMN_COUNT) {
      throw new ColumnNotFoundError(name, 'identity column has no numeric values');
    }
    return toMatrixOffset(raw);
  }
}
