/**
 * Source emitter tests
 *
 * Node trees are built by hand so each case isolates one emission rule.
 */

import { describe, it, expect } from 'vitest';
import { BindingTable } from '$lib/bindings/binding-table';
import {
  asCallStatement,
  emitNodes,
  generateModule,
  openContentBlock
} from '$lib/emitter/source-emitter';
import { InvalidConfigurationError, NodeRenderError } from '$lib/types/errors';
import {
  ENHANCED_CONTEXT,
  PLAIN_CONTEXT,
  bulletList,
  codeBlock,
  heading,
  inlineCall,
  inlineCode,
  link,
  listItem,
  paragraph,
  text
} from '../helpers/node-builders';

const plain = new BindingTable(PLAIN_CONTEXT).freeze();
const enhanced = new BindingTable(ENHANCED_CONTEXT).freeze();

describe('asCallStatement', () => {
  it('should call bare component references', () => {
    expect(asCallStatement('dom.Hr')).toBe('dom.Hr();');
  });

  it('should keep templates that are already calls', () => {
    expect(asCallStatement('dom.Text("a")')).toBe('dom.Text("a");');
    expect(asCallStatement('app.widgets.Counter()')).toBe('app.widgets.Counter();');
  });
});

describe('openContentBlock', () => {
  it('should add a content lambda to a bare reference', () => {
    expect(openContentBlock('dom.P')).toBe('dom.P(() => {');
  });

  it('should fill empty argument lists', () => {
    expect(openContentBlock('ui.Card()')).toBe('ui.Card(() => {');
  });

  it('should append the lambda after existing arguments', () => {
    expect(openContentBlock('dom.A("/page")')).toBe('dom.A("/page", () => {');
  });
});

describe('emitNodes', () => {
  it('should nest children in a content lambda', () => {
    expect(emitNodes([paragraph(text('Hello'))], plain)).toEqual([
      'dom.P(() => {',
      '  dom.Text("Hello");',
      '});'
    ]);
  });

  it('should emit leaf nodes as single calls', () => {
    expect(emitNodes([{ kind: 'thematicBreak', children: [] }], plain)).toEqual(['dom.Hr();']);
  });

  it('should descend into plain link children', () => {
    expect(emitNodes([link('/page', text('Click'))], plain)).toEqual([
      'dom.A("/page", () => {',
      '  dom.Text("Click");',
      '});'
    ]);
  });

  it('should not descend into enhanced links', () => {
    expect(emitNodes([link('/page', text('Click'))], enhanced)).toEqual([
      'kit.navigation.Link("/page", "Click");'
    ]);
  });

  it('should emit one text call per code block line', () => {
    expect(emitNodes([codeBlock('a\nb')], plain)).toEqual([
      'dom.Code({ style: { display: "block", whiteSpace: "pre-wrap" } }, () => {',
      '  dom.Text("a\\n");',
      '  dom.Text("b\\n");',
      '});'
    ]);
  });

  it('should emit inline code content as text', () => {
    expect(emitNodes([inlineCode('x')], plain)).toEqual(['dom.Code(() => {', '  dom.Text("x");', '});']);
  });

  it('should emit inline calls without children', () => {
    expect(emitNodes([inlineCall('.widgets.Counter')], plain)).toEqual(['app.widgets.Counter();']);
  });

  it('should indent nested structures two spaces per level', () => {
    expect(emitNodes([bulletList(listItem(text('one')))], plain, 1)).toEqual([
      '  dom.Ul(() => {',
      '    dom.Li(() => {',
      '      dom.Text("one");',
      '    });',
      '  });'
    ]);
  });

  it('should abort on a failing binding', () => {
    const failing = new BindingTable(PLAIN_CONTEXT, {
      text: () => {
        throw new Error('boom');
      }
    });

    expect(() => emitNodes([paragraph(text('x'))], failing)).toThrow(NodeRenderError);
  });
});

describe('generateModule', () => {
  it('should wrap the document in an exported render function', () => {
    const source = generateModule(
      { children: [heading(1, text('Hi'))], frontMatter: { title: 'Home' } },
      plain,
      {
        functionName: 'HomePage',
        imports: { kit: '@markdown-kit/enhanced-components', dom: '@markdown-kit/dom' }
      }
    );

    expect(source).toBe(
      [
        "import * as dom from '@markdown-kit/dom';",
        "import * as kit from '@markdown-kit/enhanced-components';",
        '',
        'export const frontMatter = {',
        '  "title": "Home"',
        '};',
        '',
        'export function HomePage(): void {',
        '  dom.H1(() => {',
        '    dom.Text("Hi");',
        '  });',
        '}',
        ''
      ].join('\n')
    );
  });

  it('should emit an empty function for an empty document', () => {
    expect(generateModule({ children: [], frontMatter: null }, plain, { functionName: 'Empty' })).toBe(
      'export function Empty(): void {\n}\n'
    );
  });

  it('should reject function names that are not identifiers', () => {
    expect(() =>
      generateModule({ children: [], frontMatter: null }, plain, { functionName: 'home-page' })
    ).toThrow(InvalidConfigurationError);
  });

  it('should reject import names that are not identifiers', () => {
    expect(() =>
      generateModule({ children: [], frontMatter: null }, plain, {
        functionName: 'Page',
        imports: { 'ui.kit': 'ui-kit' }
      })
    ).toThrow('Invalid configuration for "imports.ui.kit"');
  });
});
