/**
 * Binding Types
 *
 * A binding maps one node of a given kind to the template text of a component
 * invocation. Instead of mutating a shared scope, a binding returns its
 * traversal instruction alongside the template:
 *
 * - a bare string: template only, the node's real children are visited
 * - `{ template, childrenOverride: [] }`: children were consumed, do not descend
 * - `{ template, childrenOverride: [a, b] }`: visit these synthetic nodes instead
 */

import type { NodeKind } from '../types/node-kinds';
import type { MarkdownNode, NodeOfKind } from '../types/markdown-node';

/**
 * Identifiers the generated source uses to reach component namespaces,
 * e.g. `dom` in `dom.H1`
 */
export interface ComponentNamespaces {
  readonly base: string;
  readonly enhanced: string;
}

/**
 * Read-only inputs shared by every binding call of a session
 */
export interface RenderContext {
  /** Prefer the enhanced component set where a binding offers one */
  readonly useEnhancedComponents: boolean;
  readonly namespaces: ComponentNamespaces;
  /** Prepended to inline-call targets that start with `.` */
  readonly projectNamespace: string;
}

export interface BindingResult {
  readonly template: string;
  readonly childrenOverride?: readonly MarkdownNode[];
}

export type BindingOutput = string | BindingResult;

export type BindingFunction<K extends NodeKind> = (
  node: NodeOfKind<K>,
  context: RenderContext
) => BindingOutput;

/**
 * One binding per kind; the compiler rejects a map that misses one
 */
export type BindingMap = { [K in NodeKind]: BindingFunction<K> };

export type BindingOverrides = { readonly [K in NodeKind]?: BindingFunction<K> };

/**
 * Per-visit traversal state, created fresh for every rendered node
 *
 * `childrenOverride` is `null` when the binding left traversal alone.
 */
export interface VisitScope {
  readonly childrenOverride: readonly MarkdownNode[] | null;
}

export interface RenderedNode {
  readonly template: string;
  readonly scope: VisitScope;
}

export interface BindingTableStats {
  kindCount: number;
  overriddenKinds: NodeKind[];
  frozen: boolean;
}
