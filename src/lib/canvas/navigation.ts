/**
 * Navigation cursor over the sorted image list.
 *
 * The cursor is clamped, never wrapped: it always stays in [0, count - 1].
 */

export type NavigationAction =
  | { type: 'NEXT' }
  | { type: 'PREVIOUS' }
  | { type: 'JUMP_TO'; name: string };

export interface NavigationOutcome {
  cursor: number;
  /** False when a JUMP_TO name is not in the list; the cursor is kept */
  matched: boolean;
}

export function clampCursor(cursor: number, count: number): number {
  if (count <= 0) {
    throw new RangeError('Cannot place a cursor in an empty collection');
  }
  return Math.max(0, Math.min(cursor, count - 1));
}

export function stepCursor(cursor: number, step: number, count: number): number {
  return clampCursor(cursor + step, count);
}

export function navigate(
  cursor: number,
  filenames: readonly string[],
  action: NavigationAction
): NavigationOutcome {
  switch (action.type) {
    case 'NEXT':
      return { cursor: stepCursor(cursor, 1, filenames.length), matched: true };
    case 'PREVIOUS':
      return { cursor: stepCursor(cursor, -1, filenames.length), matched: true };
    case 'JUMP_TO': {
      const index = filenames.indexOf(action.name);
      if (index === -1) {
        // Unknown name reloads the current image
        return { cursor: clampCursor(cursor, filenames.length), matched: false };
      }
      return { cursor: index, matched: true };
    }
  }
}
