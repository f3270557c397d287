/**
 * wysiwyg-kit - Editable text
 *
 * Keeps a content-editable node in step with an external value. Rewriting
 * a node's text moves the caret, so a value that already matches what the
 * user typed is left alone.
 */

export interface TextTarget {
  textContent: string | null;
}

// Full text of the node, for edit events
export function readText(target: TextTarget): string {
  return target.textContent ?? '';
}

/**
 * Write `value` into `target` unless it already shows it.
 * Returns true when the node was rewritten.
 */
export function syncText(target: TextTarget, value: string): boolean {
  if (readText(target) === value) return false;
  target.textContent = value;
  return true;
}
