/**
 * Inline-call syntax
 *
 * `{{{ .widgets.VisitorCounter }}}` in a document becomes an `inlineCall`
 * token whose target is the trimmed text between the delimiters. The delimiter
 * characters are configurable; each is repeated three times.
 */

import type { MarkedExtension, Tokens } from 'marked';
import type { DelimiterPair } from '../config/markdown-config';

export const INLINE_CALL_TOKEN = 'inlineCall';

export interface InlineCallToken extends Tokens.Generic {
  type: typeof INLINE_CALL_TOKEN;
  raw: string;
  target: string;
}

export function createInlineCallPattern([open, close]: DelimiterPair): RegExp {
  const opening = escapeRegExp(open.repeat(3));
  const closing = escapeRegExp(close.repeat(3));
  const targetChar = `[^${escapeForCharacterClass(close)}\\n]`;
  return new RegExp(`^${opening}[ \\t]*(${targetChar}+?)[ \\t]*${closing}`);
}

export function createInlineCallExtension(delimiters: DelimiterPair): MarkedExtension {
  const opening = delimiters[0].repeat(3);
  const pattern = createInlineCallPattern(delimiters);

  return {
    extensions: [
      {
        name: INLINE_CALL_TOKEN,
        level: 'inline',
        start(src: string) {
          const index = src.indexOf(opening);
          return index >= 0 ? index : undefined;
        },
        tokenizer(src: string): InlineCallToken | undefined {
          const match = pattern.exec(src);
          if (!match) {
            return undefined;
          }
          return { type: INLINE_CALL_TOKEN, raw: match[0], target: match[1].trim() };
        }
      }
    ]
  };
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function escapeForCharacterClass(value: string): string {
  return value.replace(/[\\\]^-]/g, '\\$&');
}
