/**
 * Token adapter
 *
 * Converts the `marked` token stream into the `MarkdownNode` tree bindings
 * see. Tokens with no node kind of their own (`space`, link reference
 * definitions) produce nothing; raw HTML and unrecognised extension tokens
 * fall back to their children or their text.
 */

import type { Token, Tokens } from 'marked';
import { headingKind, isHeadingLevel } from '../types/node-kinds';
import {
  createTextNode,
  type HeadingNode,
  type ListItemNode,
  type MarkdownNode,
  type TableCellNode
} from '../types/markdown-node';
import { createLogger } from '../utils/logger';
import { escapeBackslashes, joinSoftBreaks } from '../utils/source-text';
import { INLINE_CALL_TOKEN } from './inline-call';

const log = createLogger('TokenAdapter');

export interface TokenAdapterOptions {
  /** Keep task markers as `ListItemNode.task`; otherwise they stay in the text */
  readonly taskList: boolean;
}

type AdaptedToken =
  | Tokens.Space
  | Tokens.Code
  | Tokens.Heading
  | Tokens.Table
  | Tokens.Hr
  | Tokens.Blockquote
  | Tokens.List
  | Tokens.Paragraph
  | Tokens.Text
  | Tokens.Def
  | Tokens.Escape
  | Tokens.Link
  | Tokens.Image
  | Tokens.Strong
  | Tokens.Em
  | Tokens.Codespan
  | Tokens.Br
  | Tokens.Del;

const ADAPTED_TYPES: ReadonlySet<string> = new Set<AdaptedToken['type']>([
  'space',
  'code',
  'heading',
  'table',
  'hr',
  'blockquote',
  'list',
  'paragraph',
  'text',
  'def',
  'escape',
  'link',
  'image',
  'strong',
  'em',
  'codespan',
  'br',
  'del'
]);

function isAdaptedToken(token: Token): token is AdaptedToken {
  return ADAPTED_TYPES.has(token.type);
}

export function toMarkdownNodes(
  tokens: readonly Token[],
  options: TokenAdapterOptions
): MarkdownNode[] {
  return tokens.flatMap((token) => adaptToken(token, options));
}

function adaptToken(token: Token, options: TokenAdapterOptions): MarkdownNode[] {
  if (token.type === INLINE_CALL_TOKEN && 'target' in token && typeof token.target === 'string') {
    return [{ kind: 'inlineCall', target: token.target, children: [] }];
  }
  if (!isAdaptedToken(token)) {
    return adaptUnknownToken(token, options);
  }

  switch (token.type) {
    case 'space':
    case 'def':
      return [];
    case 'code':
      return [
        {
          kind: 'codeBlock',
          literal: escapeBackslashes(token.text),
          info: token.lang?.trim() ?? '',
          children: []
        }
      ];
    case 'heading':
      return [headingNode(token, options)];
    case 'table':
      return [tableNode(token, options)];
    case 'hr':
      return [{ kind: 'thematicBreak', children: [] }];
    case 'blockquote':
      return [{ kind: 'blockQuote', children: toMarkdownNodes(token.tokens, options) }];
    case 'list': {
      const items = token.items.map((item) => listItemNode(item, options));
      if (token.ordered) {
        const start = typeof token.start === 'number' ? token.start : 1;
        return [{ kind: 'orderedList', start, children: items }];
      }
      return [{ kind: 'bulletList', children: items }];
    }
    case 'paragraph':
      return [{ kind: 'paragraph', children: toMarkdownNodes(token.tokens, options) }];
    case 'text':
      // Block-level text (tight list items) carries inline children
      if (token.tokens && token.tokens.length > 0) {
        return toMarkdownNodes(token.tokens, options);
      }
      return [inlineTextNode(token.raw)];
    case 'escape':
      return [inlineTextNode(token.raw.slice(1))];
    case 'link':
      return [
        {
          kind: 'link',
          destination: token.href,
          ...(token.title ? { title: token.title } : {}),
          children: toMarkdownNodes(token.tokens, options)
        }
      ];
    case 'image':
      return [
        {
          kind: 'image',
          destination: token.href,
          alt: token.text,
          ...(token.title ? { title: token.title } : {}),
          children: []
        }
      ];
    case 'strong':
      return [{ kind: 'strongEmphasis', children: toMarkdownNodes(token.tokens, options) }];
    case 'em':
      return [{ kind: 'emphasis', children: toMarkdownNodes(token.tokens, options) }];
    case 'codespan':
      return [{ kind: 'inlineCode', literal: escapeBackslashes(token.text), children: [] }];
    case 'br':
      return [{ kind: 'lineBreak', children: [] }];
    case 'del':
      return toMarkdownNodes(token.tokens, options);
    default:
      return [];
  }
}

function adaptUnknownToken(token: Token, options: TokenAdapterOptions): MarkdownNode[] {
  log.debug('No node kind for token, falling back to its content', { type: token.type });
  if ('tokens' in token && Array.isArray(token.tokens) && token.tokens.length > 0) {
    return toMarkdownNodes(token.tokens, options);
  }
  if ('text' in token && typeof token.text === 'string') {
    const text = token.text.replace(/\n+$/, '');
    return text.length > 0 ? [inlineTextNode(text)] : [];
  }
  return [];
}

/** Soft line breaks become spaces; a text literal never spans lines */
function inlineTextNode(raw: string): MarkdownNode {
  return createTextNode(escapeBackslashes(joinSoftBreaks(raw)));
}

function headingNode(token: Tokens.Heading, options: TokenAdapterOptions): HeadingNode {
  const level = isHeadingLevel(token.depth) ? token.depth : 6;
  return { kind: headingKind(level), children: toMarkdownNodes(token.tokens, options) };
}

function tableNode(token: Tokens.Table, options: TokenAdapterOptions): MarkdownNode {
  const cellsOf = (cells: readonly Tokens.TableCell[], header: boolean): TableCellNode[] =>
    cells.map((cell, index) => tableCellNode(cell, token.align[index], header, options));

  const children: MarkdownNode[] = [
    { kind: 'tableHead', children: [tableRowNode(cellsOf(token.header, true))] }
  ];
  if (token.rows.length > 0) {
    children.push({
      kind: 'tableBody',
      children: token.rows.map((row) => tableRowNode(cellsOf(row, false)))
    });
  }

  return { kind: 'table', children };
}

function tableRowNode(cells: readonly TableCellNode[]): MarkdownNode {
  return { kind: 'tableRow', children: cells };
}

function tableCellNode(
  cell: Tokens.TableCell,
  alignment: 'left' | 'center' | 'right' | null | undefined,
  header: boolean,
  options: TokenAdapterOptions
): TableCellNode {
  const children = toMarkdownNodes(cell.tokens, options);
  if (header) {
    return { kind: 'tableCellHeader', alignment: alignment ?? null, children };
  }
  return { kind: 'tableCellData', alignment: alignment ?? null, children };
}

function listItemNode(item: Tokens.ListItem, options: TokenAdapterOptions): ListItemNode {
  const children = toMarkdownNodes(item.tokens, options);
  if (!item.task) {
    return { kind: 'listItem', children };
  }

  const checked = item.checked === true;
  if (options.taskList) {
    return { kind: 'listItem', task: { checked }, children };
  }
  return { kind: 'listItem', children: prependMarker(children, checked ? '[x] ' : '[ ] ') };
}

/** Put an unrecognised task marker back in front of the item's first text */
function prependMarker(children: readonly MarkdownNode[], marker: string): MarkdownNode[] {
  const [first, ...rest] = children;
  if (first === undefined) {
    return [createTextNode(marker.trimEnd())];
  }
  if (first.kind === 'text') {
    return [createTextNode(marker + first.literal), ...rest];
  }
  if (first.kind === 'paragraph') {
    return [{ kind: 'paragraph', children: prependMarker(first.children, marker) }, ...rest];
  }
  return [createTextNode(marker), ...children];
}
