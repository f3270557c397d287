/**
 * wysiwyg-kit - Path serialization
 *
 * Helpers for writing `pathToString` functions. Output looks like
 * `plans[1].price`.
 */

import type { ListPath } from './types';

/**
 * Join a field name with the already-serialized rest of the path.
 */
export function joinPath(name: string, rest = ''): string {
  if (rest === '') return name;
  return rest.startsWith('[') ? `${name}${rest}` : `${name}.${rest}`;
}

/**
 * Serialize a list path: '' for the list, `[i]` for an item, `[i].rest` inside one
 * (`[i].value` when the item is a leaf).
 */
export function listPathToString<P>(path: ListPath<P>, itemPathToString: (path: P) => string): string {
  switch (path.kind) {
    case 'list':
      return '';
    case 'item':
      return `[${path.index}]`;
    case 'child':
      // A leaf item serializes to '', which must not share the item's own key
      return joinPath(`[${path.index}]`, itemPathToString(path.path) || 'value');
  }
}
