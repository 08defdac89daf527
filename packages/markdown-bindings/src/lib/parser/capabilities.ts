/**
 * Parser capabilities
 *
 * The `marked` lexer starts from a base configuration with every optional
 * GitHub-flavoured construct switched off. Each enabled feature toggle then
 * contributes exactly one capability unit, in the fixed `FEATURE_NAMES` order
 * so identical configurations always build identical parsers:
 *
 * - autolink: restores the bare URL / e-mail tokenizer
 * - frontMatter: strips and parses a leading YAML block before lexing
 * - inlineCall: adds the `{{{ target }}}` inline extension
 * - tables: restores the pipe table tokenizer
 * - taskList: keeps `[ ]` / `[x]` list item markers as task state
 *
 * Overlap: inline extensions are tried before built-in tokenizers, so text that
 * is both an inline call and a URL becomes an inline call.
 */

import { Tokenizer, type MarkedExtension } from 'marked';
import { enabledFeatures, type FeatureName, type MarkdownFeatures } from '../config/markdown-config';
import { extractFrontMatter, type FrontMatterResult } from './front-matter';
import { createInlineCallExtension } from './inline-call';

export interface ParserCapability {
  readonly feature: FeatureName;
  /** Layered onto the base lexer configuration */
  readonly extension?: MarkedExtension;
  /** Runs on the raw document before lexing */
  readonly preprocess?: (source: string) => FrontMatterResult;
}

export const BASE_LEXER_OPTIONS: MarkedExtension = {
  gfm: true,
  breaks: false,
  pedantic: false,
  tokenizer: {
    url() {
      return undefined;
    },
    table() {
      return undefined;
    },
    // No toggle covers strikethrough: `~~` stays literal
    del() {
      return undefined;
    }
  }
};

const AUTOLINK: ParserCapability = {
  feature: 'autolink',
  extension: {
    tokenizer: {
      url(src) {
        return Tokenizer.prototype.url.call(this, src);
      }
    }
  }
};

const FRONT_MATTER: ParserCapability = {
  feature: 'frontMatter',
  preprocess: extractFrontMatter
};

const TABLES: ParserCapability = {
  feature: 'tables',
  extension: {
    tokenizer: {
      table(src) {
        return Tokenizer.prototype.table.call(this, src);
      }
    }
  }
};

// Task markers are always lexed; the token adapter drops them back into the
// text unless this capability is present.
const TASK_LIST: ParserCapability = {
  feature: 'taskList'
};

function capabilityFor(feature: FeatureName, features: MarkdownFeatures): ParserCapability {
  switch (feature) {
    case 'autolink':
      return AUTOLINK;
    case 'frontMatter':
      return FRONT_MATTER;
    case 'inlineCall':
      return {
        feature: 'inlineCall',
        extension: createInlineCallExtension(features.inlineCallDelimiters)
      };
    case 'tables':
      return TABLES;
    case 'taskList':
      return TASK_LIST;
  }
}

export function createParserCapabilities(features: MarkdownFeatures): ParserCapability[] {
  return enabledFeatures(features).map((feature) => capabilityFor(feature, features));
}
