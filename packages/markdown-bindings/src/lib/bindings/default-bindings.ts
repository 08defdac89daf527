/**
 * Default Binding Policy
 *
 * Built-in binding for every node kind, so a render pass never fails for lack
 * of configuration. Most kinds map to a fixed structural component and let
 * their children render normally. Four kinds do more:
 *
 * - text: quote-escaped literal, plain or enhanced Text component
 * - link: enhanced components take the label from the first text child and
 *   consume the children; plain anchors keep them
 * - codeBlock: every line becomes a synthetic text node ending in a `\n`
 *   marker, so line structure survives whitespace normalisation downstream
 * - inlineCode: the literal becomes a single synthetic text child
 *
 * `inlineCall` nodes emit the resolved call expression and have no children.
 */

import { createTextNode, isTextNode } from '../types/markdown-node';
import { escapeQuotes, resolveCallTarget } from '../utils/source-text';
import type { BindingFunction, BindingMap, RenderContext } from './types';
import type { StructuralKind, HeadingKind, TableCellKind } from '../types/node-kinds';

/** Two characters, backslash and `n`: a newline escape in the generated string literal */
export const NEWLINE_MARKER = '\\n';

export const CODE_BLOCK_STYLE = '{ style: { display: "block", whiteSpace: "pre-wrap" } }';

/**
 * Component names for kinds whose binding is a fixed template
 */
export const STRUCTURAL_COMPONENTS: Readonly<
  Record<StructuralKind | HeadingKind | TableCellKind | 'image' | 'orderedList' | 'listItem', string>
> = {
  heading1: 'H1',
  heading2: 'H2',
  heading3: 'H3',
  heading4: 'H4',
  heading5: 'H5',
  heading6: 'H6',
  paragraph: 'P',
  lineBreak: 'Br',
  emphasis: 'Em',
  strongEmphasis: 'B',
  thematicBreak: 'Hr',
  blockQuote: 'Blockquote',
  bulletList: 'Ul',
  orderedList: 'Ol',
  listItem: 'Li',
  image: 'Img',
  table: 'Table',
  tableHead: 'Thead',
  tableBody: 'Tbody',
  tableRow: 'Tr',
  tableCellData: 'Td',
  tableCellHeader: 'Th'
};

type FixedKind = keyof typeof STRUCTURAL_COMPONENTS;

function fixed<K extends FixedKind>(kind: K): BindingFunction<K> {
  const component = STRUCTURAL_COMPONENTS[kind];
  return (_node, context) => `${context.namespaces.base}.${component}`;
}

function textTemplate(literal: string, context: RenderContext): string {
  const escaped = escapeQuotes(literal);
  return context.useEnhancedComponents
    ? `${context.namespaces.enhanced}.text.Text("${escaped}")`
    : `${context.namespaces.base}.Text("${escaped}")`;
}

export function createDefaultBindings(): BindingMap {
  return {
    text: (node, context) => textTemplate(node.literal, context),

    heading1: fixed('heading1'),
    heading2: fixed('heading2'),
    heading3: fixed('heading3'),
    heading4: fixed('heading4'),
    heading5: fixed('heading5'),
    heading6: fixed('heading6'),
    paragraph: fixed('paragraph'),
    lineBreak: fixed('lineBreak'),

    link: (node, context) => {
      if (!context.useEnhancedComponents) {
        return `${context.namespaces.base}.A("${node.destination}")`;
      }
      const label = escapeQuotes(node.children.find(isTextNode)?.literal ?? '');
      return {
        template: `${context.namespaces.enhanced}.navigation.Link("${node.destination}", "${label}")`,
        // The label was extracted; the children need no further visit
        childrenOverride: []
      };
    },

    emphasis: fixed('emphasis'),
    strongEmphasis: fixed('strongEmphasis'),
    thematicBreak: fixed('thematicBreak'),
    blockQuote: fixed('blockQuote'),
    bulletList: fixed('bulletList'),
    orderedList: fixed('orderedList'),
    listItem: fixed('listItem'),

    codeBlock: (node, context) => ({
      template: `${context.namespaces.base}.Code(${CODE_BLOCK_STYLE})`,
      childrenOverride: node.literal
        .trim()
        .split('\n')
        .map((line) => createTextNode(`${line}${NEWLINE_MARKER}`))
    }),

    inlineCode: (node, context) => ({
      template: `${context.namespaces.base}.Code`,
      childrenOverride: [createTextNode(node.literal)]
    }),

    inlineCall: (node, context) => ({
      template: resolveCallTarget(node.target, context.projectNamespace),
      childrenOverride: []
    }),

    image: fixed('image'),
    table: fixed('table'),
    tableHead: fixed('tableHead'),
    tableBody: fixed('tableBody'),
    tableRow: fixed('tableRow'),
    tableCellData: fixed('tableCellData'),
    tableCellHeader: fixed('tableCellHeader')
  };
}
