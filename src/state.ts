/**
 * wysiwyg-kit - Comment State
 *
 * Comment threads live beside the edited data, keyed by the string form of
 * a path. The serializer is supplied by the host since path types are plain
 * unions with no built-in notion of equality.
 */

import type { Comment, State } from './types';

/**
 * Create comment state for a path type.
 *
 * @param pathToString - Must give equal strings for paths denoting the same location
 * @param initialComments - Existing threads, keyed by serialized path, oldest comment first
 */
export function initState<P>(
  pathToString: (path: P) => string,
  initialComments: Readonly<Record<string, readonly Comment[]>> = {}
): State<P> {
  return {
    pathToString,
    comments: new Map(Object.entries(initialComments)),
    unsavedComments: new Map(),
    savingComments: new Set(),
    commentErrors: new Map(),
    focusedCommentThread: undefined,
    hoveredCommentThread: undefined,
  };
}

/**
 * View `state` through a narrower path type. Keys still come from the outer
 * serializer and the thread maps are shared, not copied. Route changes back
 * through `mapMsg` with the same injection.
 */
export function focusState<C, P>(inject: (path: C) => P, state: State<P>): State<C> {
  return {
    ...state,
    pathToString: (path) => state.pathToString(inject(path)),
  };
}

export const threadKey = <P>(state: State<P>, path: P): string => state.pathToString(path);

const noComments: readonly Comment[] = [];

export function getComments<P>(state: State<P>, path: P): readonly Comment[] {
  return state.comments.get(threadKey(state, path)) ?? noComments;
}

export function getDraft<P>(state: State<P>, path: P): string {
  return state.unsavedComments.get(threadKey(state, path)) ?? '';
}

export function isSaving<P>(state: State<P>, path: P): boolean {
  return state.savingComments.has(threadKey(state, path));
}

export function getCommentError<P>(state: State<P>, path: P): string | undefined {
  return state.commentErrors.get(threadKey(state, path));
}

export function isFocused<P>(state: State<P>, path: P): boolean {
  return state.focusedCommentThread === threadKey(state, path);
}

export function isHovered<P>(state: State<P>, path: P): boolean {
  return state.hoveredCommentThread === threadKey(state, path);
}

// Copy-on-write helpers used by update()

export function setEntry<V>(map: ReadonlyMap<string, V>, key: string, value: V): ReadonlyMap<string, V> {
  const next = new Map(map);
  next.set(key, value);
  return next;
}

export function removeEntry<V>(map: ReadonlyMap<string, V>, key: string): ReadonlyMap<string, V> {
  if (!map.has(key)) return map;
  const next = new Map(map);
  next.delete(key);
  return next;
}

export function toggleKey(set: ReadonlySet<string>, key: string, present: boolean): ReadonlySet<string> {
  if (set.has(key) === present) return set;
  const next = new Set(set);
  if (present) next.add(key);
  else next.delete(key);
  return next;
}
