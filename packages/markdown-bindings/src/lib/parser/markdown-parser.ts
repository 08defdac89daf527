import { Marked } from 'marked';
import type { FeatureName, MarkdownFeatures } from '../config/markdown-config';
import type { MarkdownNode } from '../types/markdown-node';
import { createLogger } from '../utils/logger';
import { BASE_LEXER_OPTIONS, createParserCapabilities, type ParserCapability } from './capabilities';
import type { FrontMatter } from './front-matter';
import { toMarkdownNodes } from './token-adapter';

const log = createLogger('MarkdownParser');

export interface ParsedDocument {
  /** Top-level block nodes, in document order */
  readonly children: readonly MarkdownNode[];
  /** `null` unless front matter is enabled and the document starts with a block */
  readonly frontMatter: FrontMatter | null;
}

/**
 * Markdown parser built from a feature toggle set
 *
 * The `marked` instance is private to the parser, so two parsers with
 * different toggles never share tokenizer state.
 */
export class MarkdownParser {
  readonly features: readonly FeatureName[];
  private readonly capabilities: readonly ParserCapability[];
  private readonly marked: Marked;
  private readonly taskList: boolean;

  constructor(features: MarkdownFeatures) {
    this.capabilities = createParserCapabilities(features);
    this.features = Object.freeze(this.capabilities.map((capability) => capability.feature));
    this.taskList = this.features.includes('taskList');

    const extensions = this.capabilities.flatMap((capability) =>
      capability.extension ? [capability.extension] : []
    );
    this.marked = new Marked(BASE_LEXER_OPTIONS, ...extensions);

    log.debug('Parser created', { features: this.features });
  }

  parse(source: string): ParsedDocument {
    let content = source;
    let frontMatter: FrontMatter | null = null;

    for (const capability of this.capabilities) {
      if (!capability.preprocess) continue;
      const result = capability.preprocess(content);
      content = result.content;
      frontMatter = result.frontMatter ?? frontMatter;
    }

    const tokens = this.marked.lexer(content);
    return {
      children: toMarkdownNodes(tokens, { taskList: this.taskList }),
      frontMatter
    };
  }
}

export function createMarkdownParser(features: MarkdownFeatures): MarkdownParser {
  return new MarkdownParser(features);
}
