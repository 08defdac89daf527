/**
 * Source emitter
 *
 * Walks a node tree depth-first, asks the binding table for each node's
 * template and writes one call per node. A node with children to visit opens
 * a content lambda on the call and closes it after the last child:
 *
 * ```
 * dom.P(() => {
 *   dom.Text("Hello");
 * });
 * ```
 *
 * The scope returned with each template decides what "children to visit"
 * means: the node's own children, a replacement list, or nothing.
 */

import type { BindingTable } from '../bindings/binding-table';
import { childrenToVisit } from '../bindings/visit-scope';
import type { ParsedDocument } from '../parser/markdown-parser';
import type { MarkdownNode } from '../types/markdown-node';
import { InvalidConfigurationError } from '../types/errors';

const INDENT = '  ';
const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

export interface ModuleOptions {
  /** Name of the exported render function */
  readonly functionName: string;
  /** Namespace imports, `identifier -> module specifier` */
  readonly imports?: Readonly<Record<string, string>>;
}

/**
 * Emit statements for a list of sibling nodes, indented `depth` levels
 */
export function emitNodes(
  nodes: readonly MarkdownNode[],
  table: BindingTable,
  depth = 0
): string[] {
  const lines: string[] = [];
  for (const node of nodes) {
    emitNode(node, table, depth, lines);
  }
  return lines;
}

function emitNode(node: MarkdownNode, table: BindingTable, depth: number, lines: string[]): void {
  const { template, scope } = table.render(node);
  const children = childrenToVisit(node, scope);
  const indent = INDENT.repeat(depth);
  const call = template.trimEnd();

  if (children.length === 0) {
    lines.push(`${indent}${asCallStatement(call)}`);
    return;
  }

  lines.push(`${indent}${openContentBlock(call)}`);
  for (const child of children) {
    emitNode(child, table, depth + 1, lines);
  }
  lines.push(`${indent}});`);
}

/**
 * `dom.Hr` -> `dom.Hr();`, `dom.Text("a")` -> `dom.Text("a");`
 */
export function asCallStatement(template: string): string {
  return template.endsWith(')') ? `${template};` : `${template}();`;
}

/**
 * Open a trailing content lambda on a template:
 * `dom.P` -> `dom.P(() => {`, `dom.A("/x")` -> `dom.A("/x", () => {`
 */
export function openContentBlock(template: string): string {
  if (template.endsWith('()')) {
    return `${template.slice(0, -1)}() => {`;
  }
  if (template.endsWith(')')) {
    return `${template.slice(0, -1)}, () => {`;
  }
  return `${template}(() => {`;
}

/**
 * Wrap a parsed document in a module exporting one render function
 */
export function generateModule(
  document: ParsedDocument,
  table: BindingTable,
  options: ModuleOptions
): string {
  if (!IDENTIFIER.test(options.functionName)) {
    throw new InvalidConfigurationError(
      'functionName',
      `expected a plain identifier, got ${JSON.stringify(options.functionName)}`
    );
  }

  const lines: string[] = [];

  const imports = Object.entries(options.imports ?? {}).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  for (const [identifier, specifier] of imports) {
    if (!IDENTIFIER.test(identifier)) {
      throw new InvalidConfigurationError(
        `imports.${identifier}`,
        'import names must be plain identifiers'
      );
    }
    lines.push(`import * as ${identifier} from '${specifier.replace(/'/g, "\\'")}';`);
  }
  if (imports.length > 0) {
    lines.push('');
  }

  if (document.frontMatter) {
    lines.push(`export const frontMatter = ${JSON.stringify(document.frontMatter, null, 2)};`, '');
  }

  lines.push(`export function ${options.functionName}(): void {`);
  lines.push(...emitNodes(document.children, table, 1));
  lines.push('}');

  return `${lines.join('\n')}\n`;
}
