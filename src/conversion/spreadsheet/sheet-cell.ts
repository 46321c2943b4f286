import { attribute, child, children, field, textOf } from './xml-node';

/**
 * A worksheet cell as stored in the package, before shared strings are
 * resolved.
 */
export type SheetCell =
  | { readonly kind: 'inline'; readonly text: string }
  | { readonly kind: 'shared'; readonly index: number | null }
  | { readonly kind: 'literal'; readonly raw: string };

/**
 * Concatenated text of a string item (`si` or `is`): its direct `t` plus
 * the `t` of every rich-text run.
 */
export function richText(item: unknown): string {
  const runs = children(item, 'r').map((run) => textOf(field(run, 't')));
  return textOf(field(item, 't')) + runs.join('');
}

export function classifyCell(cell: unknown): SheetCell {
  const type = attribute(cell, 't');
  if (type === 'inlineStr') {
    return { kind: 'inline', text: richText(child(cell, 'is')) };
  }

  const raw = textOf(field(cell, 'v'));
  if (type === 's') {
    const trimmed = raw.trim();
    return {
      kind: 'shared',
      index: /^\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : null,
    };
  }
  return { kind: 'literal', raw };
}

export function cellText(
  cell: SheetCell,
  sharedStrings: readonly string[],
): string {
  switch (cell.kind) {
    case 'inline':
      return cell.text;
    case 'shared':
      return cell.index !== null && cell.index < sharedStrings.length
        ? sharedStrings[cell.index]
        : '';
    case 'literal':
      return cell.raw;
  }
}
