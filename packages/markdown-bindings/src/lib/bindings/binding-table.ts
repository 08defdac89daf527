/**
 * Render Binding Table
 *
 * Holds exactly one binding per node kind. The table starts from the default
 * policy, takes caller overrides, and is frozen before the first render pass
 * of a session. Rendering a node invokes its binding with the table's context
 * and a fresh visit scope.
 *
 * Mutating a table while another caller is rendering with it is unsupported;
 * `freeze()` turns that mistake into a `BindingTableFrozenError`.
 */

import { NODE_KINDS, isNodeKind, type NodeKind } from '../types/node-kinds';
import type { MarkdownNode } from '../types/markdown-node';
import {
  BindingTableFrozenError,
  NodeRenderError,
  UnboundNodeKindError,
  toError
} from '../types/errors';
import { createLogger } from '../utils/logger';
import { createDefaultBindings } from './default-bindings';
import { normalizeBindingOutput } from './visit-scope';
import type {
  BindingFunction,
  BindingMap,
  BindingOutput,
  BindingOverrides,
  BindingTableStats,
  RenderContext,
  RenderedNode
} from './types';

const log = createLogger('BindingTable');

export class BindingTable {
  private readonly bindings: BindingMap = createDefaultBindings();
  private readonly overridden = new Set<NodeKind>();
  private frozen = false;

  constructor(
    readonly context: RenderContext,
    overrides: BindingOverrides = {}
  ) {
    for (const kind of NODE_KINDS) {
      this.applyOverride(kind, overrides);
    }
  }

  /**
   * Replace the binding for a kind
   */
  register<K extends NodeKind>(kind: K, binding: BindingFunction<K>): void {
    if (this.frozen) {
      throw new BindingTableFrozenError(kind);
    }
    if (!isNodeKind(kind)) {
      throw new UnboundNodeKindError(kind);
    }

    const slots: { [P in K]: BindingFunction<P> } = this.bindings;
    slots[kind] = binding;
    this.overridden.add(kind);
    log.debug('Binding overridden', { kind });
  }

  /**
   * Get the binding for a kind
   *
   * Every kind in `NODE_KINDS` has one; an unknown kind from an untyped caller
   * raises `UnboundNodeKindError`.
   */
  resolve<K extends NodeKind>(kind: K): BindingFunction<K> {
    if (!isNodeKind(kind)) {
      throw new UnboundNodeKindError(kind);
    }
    return this.bindings[kind];
  }

  /**
   * Render one node: its template plus the scope telling the driver where to
   * descend next. A throwing binding aborts the pass with `NodeRenderError`.
   */
  render(node: MarkdownNode): RenderedNode {
    const binding = this.resolve(node.kind);

    let output: BindingOutput;
    try {
      output = binding(node, this.context);
    } catch (error) {
      throw new NodeRenderError(node.kind, toError(error));
    }

    return normalizeBindingOutput(output);
  }

  /**
   * Reject further registrations. Called once configuration is complete.
   */
  freeze(): this {
    this.frozen = true;
    return this;
  }

  isFrozen(): boolean {
    return this.frozen;
  }

  isOverridden(kind: NodeKind): boolean {
    return this.overridden.has(kind);
  }

  getStats(): BindingTableStats {
    return {
      kindCount: Object.keys(this.bindings).length,
      overriddenKinds: NODE_KINDS.filter((kind) => this.overridden.has(kind)),
      frozen: this.frozen
    };
  }

  private applyOverride<K extends NodeKind>(kind: K, overrides: BindingOverrides): void {
    const binding = overrides[kind];
    if (binding) {
      this.register(kind, binding);
    }
  }
}
