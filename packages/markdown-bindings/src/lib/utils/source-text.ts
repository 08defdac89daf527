/**
 * Helpers for text that ends up inside generated source
 */

const DOTTED_IDENTIFIER = /^[A-Za-z_$][\w$]*(?:\.[A-Za-z_$][\w$]*)*$/;

/**
 * Escape double quotes so the value can sit inside a "..." literal.
 * Only quotes are touched; each one gains exactly one backslash.
 */
export function escapeQuotes(value: string): string {
  return value.replace(/"/g, '\\"');
}

/**
 * Double every backslash. Node literals from the parser go through this, so a
 * trailing `\` cannot swallow the closing quote of the emitted string.
 */
export function escapeBackslashes(value: string): string {
  return value.replace(/\\/g, '\\\\');
}

/**
 * Join soft-wrapped lines with a single space
 */
export function joinSoftBreaks(value: string): string {
  return value.replace(/[ \t]*\r?\n[ \t]*/g, ' ');
}

/**
 * True for `name` and `a.b.c` style identifiers
 */
export function isDottedIdentifier(value: string): boolean {
  return DOTTED_IDENTIFIER.test(value);
}

/**
 * Turn an inline-call target into a call expression
 *
 * @example
 * resolveCallTarget('.widgets.Counter', 'app');  // 'app.widgets.Counter()'
 * resolveCallTarget('ui.Banner("hi")', 'app');   // 'ui.Banner("hi")'
 */
export function resolveCallTarget(target: string, projectNamespace: string): string {
  const trimmed = target.trim();
  const qualified = trimmed.startsWith('.') ? `${projectNamespace}${trimmed}` : trimmed;
  return qualified.includes('(') ? qualified : `${qualified}()`;
}
