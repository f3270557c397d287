/**
 * wysiwyg-kit - Definitions
 *
 * Combinators describing which leaves of a nested data shape are editable
 * text. Every combinator is total: an edit that does not resolve, or text
 * that does not parse, leaves the data exactly as it was.
 */

import { z } from 'zod';
import type { Definition, EditAction, EditOp, LeafPath, ListPath } from './types';

// Integer text: optional sign, decimal digits, nothing else
const intText = z
  .string()
  .regex(/^[+-]?\d+$/)
  .transform(Number)
  .pipe(z.number().int().safe())
  // '-0' reads back as '0'
  .transform((n) => n + 0);

const withPath = <P>(op: EditOp, path: P): EditAction<P> =>
  op.op === 'edit' ? { op: 'edit', path, text: op.text } : { op: 'delete', path };

/**
 * A plain string field. Delete is a no-op: only containers can remove things.
 */
export const leafString: Definition<LeafPath, string> = {
  applyEdit: (action, old) => (action.op === 'edit' ? action.text : old),
  getString: (_path, value) => value,
};

/**
 * An integer field. Text that is not an integer keeps the previous value.
 */
export const leafInt: Definition<LeafPath, number> = {
  applyEdit: (action, old) => {
    if (action.op !== 'edit') return old;
    const result = intText.safeParse(action.text);
    return result.success ? result.data : old;
  },
  getString: (_path, value) => String(value),
};

/**
 * Placeholder for a substructure that is not editable (yet).
 */
export function empty<P, D>(): Definition<P, D> {
  return {
    applyEdit: (_action, data) => data,
    getString: () => undefined,
  };
}

// A field resolved to a concrete child path
export interface FieldRoute<D> {
  applyEdit: (op: EditOp, data: D) => D;
  getString: (data: D) => string | undefined;
}

// One field of a record: where it lives in D and how its leaves are addressed
export interface Field<D, FP> {
  at: (path: FP) => FieldRoute<D>;
}

/**
 * Define a record field from a getter, a setter and the field's own definition.
 *
 * @example
 * ```typescript
 * const title = field((page: Page) => page.title, (title, page) => ({ ...page, title }), leafString)
 * ```
 */
export function field<D, FD, FP>(
  get: (data: D) => FD,
  set: (value: FD, data: D) => D,
  definition: Definition<FP, FD>
): Field<D, FP> {
  return {
    at: (path) => ({
      applyEdit: (op, data) => {
        const before = get(data);
        const after = definition.applyEdit(withPath(op, path), before);
        return after === before ? data : set(after, data);
      },
      getString: (data) => definition.getString(path, get(data)),
    }),
  };
}

/**
 * A record of any number of fields.
 *
 * `dispatch` maps a path to the field it denotes (via `field.at(childPath)`),
 * or `undefined` when the path is not part of this record. It only sees the
 * path, and no two fields may claim the same path.
 *
 * @example
 * ```typescript
 * const page = objectOf<PagePath, Page>((path) => {
 *   switch (path.kind) {
 *     case 'title': return pageFields.title.at(undefined)
 *     case 'plans': return pageFields.plans.at(path.path)
 *   }
 * })
 * ```
 */
export function objectOf<P, D>(
  dispatch: (path: P) => FieldRoute<D> | undefined
): Definition<P, D> {
  return {
    applyEdit: (action, data) => {
      const route = dispatch(action.path);
      return route ? route.applyEdit(action, data) : data;
    },
    getString: (path, data) => dispatch(path)?.getString(data),
  };
}

export const wholeList = (): { kind: 'list' } => ({ kind: 'list' });

export const listItem = (index: number): { kind: 'item'; index: number } => ({ kind: 'item', index });

export const inListItem = <P>(index: number, path: P): { kind: 'child'; index: number; path: P } => ({
  kind: 'child',
  index,
  path,
});

/**
 * A list whose items share one definition.
 *
 * - `{ kind: 'list' }` is the list as a whole (appending is up to the host)
 * - `{ kind: 'item', index }` is the item itself; delete removes it and later items shift down
 * - `{ kind: 'child', index, path }` edits inside item `index` only
 */
export function listOf<P, I>(item: Definition<P, I>): Definition<ListPath<P>, I[]> {
  const inRange = (index: number, items: I[]): boolean =>
    Number.isInteger(index) && index >= 0 && index < items.length;

  return {
    applyEdit: (action, items) => {
      const path = action.path;
      if (path.kind === 'list' || !inRange(path.index, items)) return items;

      if (path.kind === 'item') {
        return action.op === 'delete' ? items.filter((_, i) => i !== path.index) : items;
      }

      const before = items[path.index];
      const after = item.applyEdit(withPath(action, path.path), before);
      if (after === before) return items;
      return items.map((existing, i) => (i === path.index ? after : existing));
    },

    getString: (path, items) => {
      if (path.kind !== 'child' || !inRange(path.index, items)) return undefined;
      return item.getString(path.path, items[path.index]);
    },
  };
}
