/**
 * Markdown configuration
 *
 * One resolved, frozen configuration per session. Caller input is merged over
 * the defaults below and validated once; nothing re-reads the environment
 * afterwards.
 *
 * @example
 * ```typescript
 * const config = resolveMarkdownConfig({
 *   features: { tables: false },
 *   useEnhancedComponents: detectEnhancedComponents(manifest)
 * });
 * ```
 */

import { InvalidConfigurationError } from '../types/errors';
import { isDottedIdentifier } from '../utils/source-text';
import type {
  BindingOverrides,
  ComponentNamespaces,
  RenderContext
} from '../bindings/types';

export const FEATURE_NAMES = ['autolink', 'frontMatter', 'inlineCall', 'tables', 'taskList'] as const;
export type FeatureName = (typeof FEATURE_NAMES)[number];

export type DelimiterPair = readonly [open: string, close: string];

/**
 * Optional parser capabilities. Each enabled flag adds one capability to the
 * parser; see `createParserCapabilities`.
 */
export interface MarkdownFeatures {
  /** Turn bare URLs and e-mail addresses into links */
  readonly autolink: boolean;
  /** Read a leading `---` YAML block as document metadata */
  readonly frontMatter: boolean;
  /** `{{{ .widgets.Counter }}}` becomes a call in the generated source */
  readonly inlineCall: boolean;
  /** Single characters, each repeated three times around an inline call */
  readonly inlineCallDelimiters: DelimiterPair;
  /** Pipe tables */
  readonly tables: boolean;
  /** `- [ ]` and `- [x]` list items */
  readonly taskList: boolean;
}

export interface MarkdownConfig {
  readonly features: MarkdownFeatures;
  readonly useEnhancedComponents: boolean;
  readonly namespaces: ComponentNamespaces;
  readonly projectNamespace: string;
  readonly bindings: BindingOverrides;
}

export interface MarkdownConfigInput {
  features?: Partial<MarkdownFeatures>;
  useEnhancedComponents?: boolean;
  namespaces?: Partial<ComponentNamespaces>;
  projectNamespace?: string;
  bindings?: BindingOverrides;
}

export const DEFAULT_FEATURES: MarkdownFeatures = Object.freeze({
  autolink: true,
  frontMatter: true,
  inlineCall: true,
  inlineCallDelimiters: Object.freeze(['{', '}'] as const),
  tables: true,
  taskList: true
});

export const DEFAULT_NAMESPACES: ComponentNamespaces = Object.freeze({
  base: 'dom',
  enhanced: 'kit'
});

export const DEFAULT_PROJECT_NAMESPACE = 'app';

export function resolveMarkdownConfig(input: MarkdownConfigInput = {}): MarkdownConfig {
  const features: MarkdownFeatures = { ...DEFAULT_FEATURES, ...input.features };
  const namespaces: ComponentNamespaces = { ...DEFAULT_NAMESPACES, ...input.namespaces };
  const projectNamespace = input.projectNamespace ?? DEFAULT_PROJECT_NAMESPACE;

  validateDelimiters(features.inlineCallDelimiters);
  validateIdentifier('namespaces.base', namespaces.base);
  validateIdentifier('namespaces.enhanced', namespaces.enhanced);
  validateIdentifier('projectNamespace', projectNamespace);

  return Object.freeze({
    features: Object.freeze({
      ...features,
      inlineCallDelimiters: Object.freeze([...features.inlineCallDelimiters] as const)
    }),
    useEnhancedComponents: input.useEnhancedComponents ?? false,
    namespaces: Object.freeze(namespaces),
    projectNamespace,
    bindings: Object.freeze({ ...input.bindings })
  });
}

export function createRenderContext(config: MarkdownConfig): RenderContext {
  return Object.freeze({
    useEnhancedComponents: config.useEnhancedComponents,
    namespaces: config.namespaces,
    projectNamespace: config.projectNamespace
  });
}

export function enabledFeatures(features: MarkdownFeatures): FeatureName[] {
  return FEATURE_NAMES.filter((name) => features[name]);
}

/**
 * Identical open and close characters are accepted; only the length matters
 * to the tokenizer.
 */
function validateDelimiters(delimiters: DelimiterPair): void {
  const [open, close] = delimiters;
  for (const [position, value] of [
    ['open', open],
    ['close', close]
  ] as const) {
    if (typeof value !== 'string' || [...value].length !== 1) {
      throw new InvalidConfigurationError(
        'features.inlineCallDelimiters',
        `${position} delimiter must be a single character, got ${JSON.stringify(value)}`
      );
    }
  }
}

export function validateIdentifier(field: string, value: string): void {
  if (!isDottedIdentifier(value)) {
    throw new InvalidConfigurationError(
      field,
      `expected an identifier such as "dom" or "ui.dom", got ${JSON.stringify(value)}`
    );
  }
}
