/**
 * Markdown session
 *
 * Resolves configuration once, builds the parser from the feature toggles and
 * a frozen binding table from the overrides, then renders any number of
 * documents with them.
 *
 * @example
 * ```typescript
 * const session = createMarkdownSession({ useEnhancedComponents: true });
 * const { source } = session.render('# Hello');
 * // dom.H1(() => {
 * //   kit.text.Text("Hello");
 * // });
 * ```
 */

import { BindingTable } from './bindings/binding-table';
import {
  createRenderContext,
  resolveMarkdownConfig,
  type MarkdownConfig,
  type MarkdownConfigInput
} from './config/markdown-config';
import { emitNodes, generateModule, type ModuleOptions } from './emitter/source-emitter';
import type { FrontMatter } from './parser/front-matter';
import { MarkdownParser } from './parser/markdown-parser';
import { createLogger } from './utils/logger';

const log = createLogger('Session');

export interface RenderedDocument {
  /** Generated statements, one per line */
  readonly source: string;
  readonly frontMatter: FrontMatter | null;
}

export class MarkdownSession {
  readonly config: MarkdownConfig;
  readonly parser: MarkdownParser;
  readonly bindings: BindingTable;

  constructor(input: MarkdownConfigInput = {}) {
    this.config = resolveMarkdownConfig(input);
    this.parser = new MarkdownParser(this.config.features);
    this.bindings = new BindingTable(createRenderContext(this.config), this.config.bindings).freeze();

    log.debug('Session ready', {
      features: this.parser.features,
      useEnhancedComponents: this.config.useEnhancedComponents,
      overriddenKinds: this.bindings.getStats().overriddenKinds
    });
  }

  render(markdown: string): RenderedDocument {
    const done = log.time('Render document');
    try {
      const document = this.parser.parse(markdown);
      return {
        source: emitNodes(document.children, this.bindings).join('\n'),
        frontMatter: document.frontMatter
      };
    } finally {
      done();
    }
  }

  renderModule(markdown: string, options: ModuleOptions): string {
    return generateModule(this.parser.parse(markdown), this.bindings, options);
  }
}

export function createMarkdownSession(input?: MarkdownConfigInput): MarkdownSession {
  return new MarkdownSession(input);
}
