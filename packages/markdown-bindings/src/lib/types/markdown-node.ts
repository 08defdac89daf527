/**
 * Markdown node tree
 *
 * The tree handed to bindings: a discriminated union on `kind`, one member per
 * entry of `NODE_KINDS`. Nodes are plain readonly data; bindings must not
 * mutate them, and synthetic nodes (code block lines, inline code content)
 * are built with `createTextNode`.
 *
 * @example
 * ```typescript
 * const link: LinkNode = {
 *   kind: 'link',
 *   destination: '/page',
 *   children: [createTextNode('Click')]
 * };
 * ```
 */

import type { HeadingKind, NodeKind, StructuralKind, TableCellKind } from './node-kinds';

export type CellAlignment = 'left' | 'center' | 'right' | null;

interface NodeShape<K extends NodeKind> {
  readonly kind: K;
  readonly children: readonly MarkdownNode[];
}

export interface TextNode extends NodeShape<'text'> {
  readonly literal: string;
}

export interface LinkNode extends NodeShape<'link'> {
  readonly destination: string;
  readonly title?: string;
}

export interface ImageNode extends NodeShape<'image'> {
  readonly destination: string;
  readonly alt: string;
  readonly title?: string;
}

export interface OrderedListNode extends NodeShape<'orderedList'> {
  readonly start: number;
}

export interface ListItemNode extends NodeShape<'listItem'> {
  /** Present only when task-list syntax was recognised for this item */
  readonly task?: { readonly checked: boolean };
}

export interface CodeBlockNode extends NodeShape<'codeBlock'> {
  readonly literal: string;
  /** Info string after the opening fence, empty for indented blocks */
  readonly info: string;
}

export interface InlineCodeNode extends NodeShape<'inlineCode'> {
  readonly literal: string;
}

export interface InlineCallNode extends NodeShape<'inlineCall'> {
  /** Call target as written between the delimiters, e.g. `.widgets.Counter` */
  readonly target: string;
}

export type HeadingNode = { [K in HeadingKind]: NodeShape<K> }[HeadingKind];

export type TableCellNode = {
  [K in TableCellKind]: NodeShape<K> & { readonly alignment: CellAlignment };
}[TableCellKind];

export type StructuralNode = { [K in StructuralKind]: NodeShape<K> }[StructuralKind];

export type MarkdownNode =
  | TextNode
  | HeadingNode
  | LinkNode
  | ImageNode
  | OrderedListNode
  | ListItemNode
  | CodeBlockNode
  | InlineCodeNode
  | InlineCallNode
  | TableCellNode
  | StructuralNode;

export type NodeOfKind<K extends NodeKind> = Extract<MarkdownNode, { kind: K }>;

export function createTextNode(literal: string): TextNode {
  return { kind: 'text', literal, children: [] };
}

export function isTextNode(node: MarkdownNode): node is TextNode {
  return node.kind === 'text';
}
