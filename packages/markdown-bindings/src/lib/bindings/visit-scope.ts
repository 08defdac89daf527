import type { MarkdownNode } from '../types/markdown-node';
import type { BindingOutput, VisitScope } from './types';

export function createVisitScope(childrenOverride?: readonly MarkdownNode[]): VisitScope {
  return Object.freeze({
    childrenOverride: childrenOverride ? Object.freeze([...childrenOverride]) : null
  });
}

/**
 * Split a binding's output into its template and a fresh scope
 */
export function normalizeBindingOutput(output: BindingOutput): {
  template: string;
  scope: VisitScope;
} {
  if (typeof output === 'string') {
    return { template: output, scope: createVisitScope() };
  }
  return { template: output.template, scope: createVisitScope(output.childrenOverride) };
}

/**
 * Children the driver descends into after rendering `node`:
 * the override when one was set (possibly empty), otherwise the real children.
 */
export function childrenToVisit(node: MarkdownNode, scope: VisitScope): readonly MarkdownNode[] {
  return scope.childrenOverride ?? node.children;
}

export function stopsDescent(scope: VisitScope): boolean {
  return scope.childrenOverride !== null && scope.childrenOverride.length === 0;
}
