/**
 * Cursor over an ordered sequence.
 * Non-empty lists always carry a cursor inside bounds; empty lists carry none.
 */
export interface SelectionList<T> {
  readonly items: readonly T[];
  readonly cursor: number | null;
}

export function createSelectionList<T>(
  items: readonly T[] = [],
): SelectionList<T> {
  return {
    items: [...items],
    cursor: items.length > 0 ? 0 : null,
  };
}

/**
 * Install a new sequence; the previous cursor is discarded
 */
export function replaceItems<T>(
  _list: SelectionList<T>,
  items: readonly T[],
): SelectionList<T> {
  return createSelectionList(items);
}

// Saturates at the first item
export function moveUp<T>(list: SelectionList<T>): SelectionList<T> {
  if (list.items.length === 0) return list;
  const current = list.cursor ?? 0;
  return { ...list, cursor: Math.max(current - 1, 0) };
}

// Wraps to the first item after the last one
export function moveDown<T>(list: SelectionList<T>): SelectionList<T> {
  if (list.items.length === 0) return list;
  const current = list.cursor ?? 0;
  const lastIdx = list.items.length - 1;
  return { ...list, cursor: current < lastIdx ? current + 1 : 0 };
}

export function selectedItem<T>(list: SelectionList<T>): T | undefined {
  if (list.cursor === null) return undefined;
  return list.items[list.cursor];
}

export function cursorIndex<T>(list: SelectionList<T>): number {
  return list.cursor ?? 0;
}
