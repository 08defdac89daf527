// Node tree
export {
  NODE_KINDS,
  HEADING_KINDS,
  TABLE_CELL_KINDS,
  isNodeKind,
  isHeadingLevel,
  headingKind
} from './types/node-kinds';
export type {
  NodeKind,
  HeadingKind,
  TableCellKind,
  HeadingLevel,
  StructuralKind
} from './types/node-kinds';
export { createTextNode, isTextNode } from './types/markdown-node';
export type {
  CellAlignment,
  TextNode,
  LinkNode,
  ImageNode,
  OrderedListNode,
  ListItemNode,
  CodeBlockNode,
  InlineCodeNode,
  InlineCallNode,
  HeadingNode,
  TableCellNode,
  StructuralNode,
  MarkdownNode,
  NodeOfKind
} from './types/markdown-node';

// Errors
export {
  UnboundNodeKindError,
  BindingTableFrozenError,
  NodeRenderError,
  InvalidConfigurationError,
  isMarkdownBindingsError,
  toError
} from './types/errors';
export type { MarkdownBindingsError } from './types/errors';

// Bindings
export { BindingTable } from './bindings/binding-table';
export {
  createDefaultBindings,
  STRUCTURAL_COMPONENTS,
  NEWLINE_MARKER,
  CODE_BLOCK_STYLE
} from './bindings/default-bindings';
export {
  createVisitScope,
  normalizeBindingOutput,
  childrenToVisit,
  stopsDescent
} from './bindings/visit-scope';
export type {
  ComponentNamespaces,
  RenderContext,
  BindingResult,
  BindingOutput,
  BindingFunction,
  BindingMap,
  BindingOverrides,
  VisitScope,
  RenderedNode,
  BindingTableStats
} from './bindings/types';

// Configuration
export {
  FEATURE_NAMES,
  DEFAULT_FEATURES,
  DEFAULT_NAMESPACES,
  DEFAULT_PROJECT_NAMESPACE,
  resolveMarkdownConfig,
  createRenderContext,
  enabledFeatures
} from './config/markdown-config';
export type {
  FeatureName,
  DelimiterPair,
  MarkdownFeatures,
  MarkdownConfig,
  MarkdownConfigInput
} from './config/markdown-config';
export {
  DEFAULT_ENHANCED_PACKAGE,
  hasDependencyNamed,
  detectEnhancedComponents,
  toPackageManifest,
  loadPackageManifest
} from './utils/package-manifest';
export type { PackageManifest } from './utils/package-manifest';

// Parsing
export { MarkdownParser, createMarkdownParser } from './parser/markdown-parser';
export type { ParsedDocument } from './parser/markdown-parser';
export { createParserCapabilities, BASE_LEXER_OPTIONS } from './parser/capabilities';
export type { ParserCapability } from './parser/capabilities';
export { extractFrontMatter } from './parser/front-matter';
export type { FrontMatter, FrontMatterResult } from './parser/front-matter';
export {
  INLINE_CALL_TOKEN,
  createInlineCallExtension,
  createInlineCallPattern
} from './parser/inline-call';
export type { InlineCallToken } from './parser/inline-call';
export { toMarkdownNodes } from './parser/token-adapter';
export type { TokenAdapterOptions } from './parser/token-adapter';

// Emitting
export {
  emitNodes,
  generateModule,
  asCallStatement,
  openContentBlock
} from './emitter/source-emitter';
export type { ModuleOptions } from './emitter/source-emitter';
export { MarkdownSession, createMarkdownSession } from './session';
export type { RenderedDocument } from './session';

// Utilities
export {
  escapeQuotes,
  escapeBackslashes,
  joinSoftBreaks,
  isDottedIdentifier,
  resolveCallTarget
} from './utils/source-text';
export { Logger, createLogger, logger, LOG_LEVELS, LOG_LEVEL_ENV, isLogLevel } from './utils/logger';
export type { LogLevel, LoggerConfig } from './utils/logger';
