/**
 * Default Binding Policy tests
 *
 * Bindings are called directly with a plain or enhanced context; the binding
 * table and emitter are covered separately.
 */

import { describe, it, expect } from 'vitest';
import { BindingTable } from '$lib/bindings/binding-table';
import { CODE_BLOCK_STYLE, createDefaultBindings } from '$lib/bindings/default-bindings';
import { normalizeBindingOutput } from '$lib/bindings/visit-scope';
import { NODE_KINDS } from '$lib/types/node-kinds';
import {
  ENHANCED_CONTEXT,
  PLAIN_CONTEXT,
  codeBlock,
  inlineCall,
  inlineCode,
  link,
  paragraph,
  sampleNode,
  text
} from '../helpers/node-builders';

const bindings = createDefaultBindings();

describe('createDefaultBindings', () => {
  it('should bind every node kind', () => {
    expect(Object.keys(bindings).sort()).toEqual([...NODE_KINDS].sort());
  });

  it('should return a fresh map on every call', () => {
    expect(createDefaultBindings()).not.toBe(createDefaultBindings());
  });
});

describe('text binding', () => {
  it('should escape double quotes in the literal', () => {
    expect(bindings.text(text('He said "hi"'), PLAIN_CONTEXT)).toBe('dom.Text("He said \\"hi\\"")');
  });

  it('should use the enhanced Text component when enabled', () => {
    expect(bindings.text(text('Hello'), ENHANCED_CONTEXT)).toBe('kit.text.Text("Hello")');
  });

  it('should follow custom namespaces', () => {
    const context = { ...PLAIN_CONTEXT, namespaces: { base: 'ui.dom', enhanced: 'ui.kit' } };
    expect(bindings.text(text('x'), context)).toBe('ui.dom.Text("x")');
  });
});

describe('link binding', () => {
  it('should emit a plain anchor that keeps its children', () => {
    const output = bindings.link(link('/page', text('Click')), PLAIN_CONTEXT);

    expect(output).toBe('dom.A("/page")');
    expect(normalizeBindingOutput(output).scope.childrenOverride).toBeNull();
  });

  it('should take the enhanced label from the first text child and consume the children', () => {
    const output = bindings.link(link('/page', text('Click')), ENHANCED_CONTEXT);

    expect(output).toEqual({
      template: 'kit.navigation.Link("/page", "Click")',
      childrenOverride: []
    });
  });

  it('should use an empty label when no direct child is text', () => {
    const node = link('/page', { kind: 'emphasis', children: [text('Click')] });

    expect(normalizeBindingOutput(bindings.link(node, ENHANCED_CONTEXT)).template).toBe(
      'kit.navigation.Link("/page", "")'
    );
  });

  it('should escape quotes in the enhanced label', () => {
    const node = link('/quote', text('Say "yes"'));

    expect(normalizeBindingOutput(bindings.link(node, ENHANCED_CONTEXT)).template).toBe(
      'kit.navigation.Link("/quote", "Say \\"yes\\"")'
    );
  });
});

describe('codeBlock binding', () => {
  it('should split the literal into lines ending in a newline marker', () => {
    expect(bindings.codeBlock(codeBlock('a\nb'), PLAIN_CONTEXT)).toEqual({
      template: `dom.Code(${CODE_BLOCK_STYLE})`,
      childrenOverride: [text('a\\n'), text('b\\n')]
    });
  });

  it('should trim surrounding blank lines before splitting', () => {
    const { scope } = normalizeBindingOutput(
      bindings.codeBlock(codeBlock('\n\nonly\n\n'), PLAIN_CONTEXT)
    );
    expect(scope.childrenOverride).toEqual([text('only\\n')]);
  });

  it('should keep inner blank lines', () => {
    const { scope } = normalizeBindingOutput(bindings.codeBlock(codeBlock('a\n\nb'), PLAIN_CONTEXT));
    expect(scope.childrenOverride?.map((node) => (node.kind === 'text' ? node.literal : ''))).toEqual([
      'a\\n',
      '\\n',
      'b\\n'
    ]);
  });

  it('should emit the block style template', () => {
    expect(CODE_BLOCK_STYLE).toBe('{ style: { display: "block", whiteSpace: "pre-wrap" } }');
  });
});

describe('inlineCode binding', () => {
  it('should replace the children with the literal as text', () => {
    expect(bindings.inlineCode(inlineCode('a + b'), PLAIN_CONTEXT)).toEqual({
      template: 'dom.Code',
      childrenOverride: [text('a + b')]
    });
  });
});

describe('inlineCall binding', () => {
  it('should qualify project-relative targets and stop descent', () => {
    expect(bindings.inlineCall(inlineCall('.widgets.Counter'), PLAIN_CONTEXT)).toEqual({
      template: 'app.widgets.Counter()',
      childrenOverride: []
    });
  });
});

describe('structural bindings', () => {
  const table = new BindingTable(PLAIN_CONTEXT);

  it.each([
    ['heading1', 'dom.H1'],
    ['heading6', 'dom.H6'],
    ['paragraph', 'dom.P'],
    ['lineBreak', 'dom.Br'],
    ['emphasis', 'dom.Em'],
    ['strongEmphasis', 'dom.B'],
    ['thematicBreak', 'dom.Hr'],
    ['blockQuote', 'dom.Blockquote'],
    ['bulletList', 'dom.Ul'],
    ['orderedList', 'dom.Ol'],
    ['listItem', 'dom.Li'],
    ['image', 'dom.Img'],
    ['table', 'dom.Table'],
    ['tableHead', 'dom.Thead'],
    ['tableBody', 'dom.Tbody'],
    ['tableRow', 'dom.Tr'],
    ['tableCellData', 'dom.Td'],
    ['tableCellHeader', 'dom.Th']
  ] as const)('should bind %s to %s and keep its children', (kind, expected) => {
    const { template, scope } = table.render(sampleNode(kind));

    expect(template).toBe(expected);
    expect(scope.childrenOverride).toBeNull();
  });

  it('should not depend on the enhanced flag', () => {
    expect(bindings.paragraph(paragraph(text('x')), ENHANCED_CONTEXT)).toBe('dom.P');
    expect(bindings.heading2({ kind: 'heading2', children: [text('x')] }, ENHANCED_CONTEXT)).toBe(
      'dom.H2'
    );
  });
});

describe('idempotence', () => {
  it('should produce equal output for the same node and context', () => {
    const node = link('/page', text('Click'));
    expect(bindings.link(node, ENHANCED_CONTEXT)).toEqual(bindings.link(node, ENHANCED_CONTEXT));
    expect(bindings.codeBlock(codeBlock('a\nb'), PLAIN_CONTEXT)).toEqual(
      bindings.codeBlock(codeBlock('a\nb'), PLAIN_CONTEXT)
    );
  });
});
