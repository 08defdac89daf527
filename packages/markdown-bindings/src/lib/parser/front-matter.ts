import * as yaml from 'yaml';
import { createLogger } from '../utils/logger';

const log = createLogger('FrontMatter');

const FRONT_MATTER_BLOCK = /^---[ \t]*\r?\n(?:([\s\S]*?)\r?\n)?---[ \t]*(?:\r?\n|$)/;

export type FrontMatter = Readonly<Record<string, unknown>>;

export interface FrontMatterResult {
  /** `null` when the document has no (readable) front matter block */
  frontMatter: FrontMatter | null;
  /** The document with the block removed */
  content: string;
}

/**
 * Split a leading `---` YAML block from the document
 *
 * An empty block yields `{}`. A block that is not a YAML mapping (a thematic
 * break followed by prose, say) is not front matter and stays in the content.
 * YAML that fails to parse is logged and left in the content too.
 */
export function extractFrontMatter(source: string): FrontMatterResult {
  const match = FRONT_MATTER_BLOCK.exec(source);
  if (!match) {
    return { frontMatter: null, content: source };
  }

  let parsed: unknown;
  try {
    parsed = yaml.parse(match[1] ?? '');
  } catch (error) {
    log.warn('Failed to parse front matter, keeping it as content', error);
    return { frontMatter: null, content: source };
  }

  const content = source.slice(match[0].length);
  if (parsed === null || parsed === undefined) {
    return { frontMatter: {}, content };
  }
  if (!isPlainRecord(parsed)) {
    return { frontMatter: null, content: source };
  }
  return { frontMatter: parsed, content };
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
