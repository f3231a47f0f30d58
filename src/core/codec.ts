import { COORDINATE_SCALE, PERCENT_MAX, X_MULTIPLIER, Y_MULTIPLIER } from './constants.js';

/**
 * Packs two map percentages into one integer key:
 * `XXXXYYYY00`, four fixed-point digits per axis and two spare low digits.
 * Sorting the keys numerically walks the map row by row from the top left.
 */
export function encodeCoordinate(x: number, y: number): number {
  const px = Math.floor((x / PERCENT_MAX) * COORDINATE_SCALE + 0.5);
  const py = Math.floor((y / PERCENT_MAX) * COORDINATE_SCALE + 0.5);
  return px * X_MULTIPLIER + py * Y_MULTIPLIER;
}

/** First free slot at or above `hint`. The caller owns `occupied`. */
export function allocateCoordinate(hint: number, occupied: ReadonlySet<number>): number {
  let candidate = hint;
  while (occupied.has(candidate)) {
    candidate += 1;
  }
  return candidate;
}
