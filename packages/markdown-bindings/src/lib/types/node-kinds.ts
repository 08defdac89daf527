/**
 * Node Type Registry
 *
 * The closed set of Markdown node kinds that can be bound to a component.
 * `NODE_KINDS` is the single source of truth; its order is the order in which
 * binding overrides are applied and statistics are reported.
 */

export const HEADING_KINDS = [
  'heading1',
  'heading2',
  'heading3',
  'heading4',
  'heading5',
  'heading6'
] as const;

export const TABLE_CELL_KINDS = ['tableCellData', 'tableCellHeader'] as const;

export const NODE_KINDS = [
  'text',
  ...HEADING_KINDS,
  'paragraph',
  'lineBreak',
  'link',
  'emphasis',
  'strongEmphasis',
  'thematicBreak',
  'blockQuote',
  'bulletList',
  'orderedList',
  'listItem',
  'codeBlock',
  'inlineCode',
  'inlineCall',
  'image',
  'table',
  'tableHead',
  'tableBody',
  'tableRow',
  ...TABLE_CELL_KINDS
] as const;

export type NodeKind = (typeof NODE_KINDS)[number];
export type HeadingKind = (typeof HEADING_KINDS)[number];
export type TableCellKind = (typeof TABLE_CELL_KINDS)[number];
export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6;

/**
 * Kinds whose nodes carry nothing but children
 */
export type StructuralKind = Exclude<
  NodeKind,
  | 'text'
  | HeadingKind
  | 'link'
  | 'image'
  | 'orderedList'
  | 'listItem'
  | 'codeBlock'
  | 'inlineCode'
  | 'inlineCall'
  | TableCellKind
>;

export function isNodeKind(value: string): value is NodeKind {
  return (NODE_KINDS as readonly string[]).includes(value);
}

export function isHeadingLevel(value: number): value is HeadingLevel {
  return Number.isInteger(value) && value >= 1 && value <= 6;
}

export function headingKind(level: HeadingLevel): HeadingKind {
  return HEADING_KINDS[level - 1];
}
