/**
 * wysiwyg-kit - Editor
 *
 * A Zustand store that owns the edited data and comment state, runs
 * update() for each message and carries out the effects it returns.
 */

import { create, type StoreApi, type UseBoundStore } from 'zustand';
import type { Comment, CommentResult, Definition, Effect, Msg, State } from './types';
import { initState } from './state';
import { mapMsg, update } from './update';
import { parseComment } from './comment';

export interface CreateCommentRequest<P> {
  path: P;
  /** Serialized path of the thread */
  key: string;
  text: string;
}

export interface EditorOptions<P, D> {
  data: D;
  pathToString: (path: P) => string;
  initialComments?: Readonly<Record<string, readonly Comment[]>>;
  /** Persist a new comment. Resolves with the stored comment (validated before use). */
  createComment: (request: CreateCommentRequest<P>) => Promise<unknown>;
  /** Defaults to console */
  logger?: Pick<Console, 'warn'>;
}

export interface EditorState<P, D> {
  data: D;
  comments: State<P>;
  /** Resolves once the message and any effect it started have been handled. Never rejects. */
  dispatch: (msg: Msg<P>) => Promise<void>;
  /** Host-level data changes the definition does not cover, such as appending to a list */
  setData: (fn: (data: D) => D) => void;
}

export interface EditorHook<P, D> extends UseBoundStore<StoreApi<EditorState<P, D>>> {
  definition: Definition<P, D>;
}

/**
 * Create an editor store for a definition.
 *
 * @example
 * ```typescript
 * const usePage = createEditor(pageDefinition, {
 *   data: { title: 'Pricing', plans: [] },
 *   pathToString: (path) => JSON.stringify(path),
 *   createComment: ({ key, text }) => api.postComment(key, text),
 * })
 *
 * await usePage.getState().dispatch(edit({ kind: 'title' }, 'New Title'))
 * ```
 */
export function createEditor<P, D>(definition: Definition<P, D>, options: EditorOptions<P, D>): EditorHook<P, D> {
  const logger = options.logger ?? console;

  const useStore = create<EditorState<P, D>>()((set, get) => {
    const runEffect = async (effect: Effect<P>): Promise<void> => {
      const key = get().comments.pathToString(effect.path);
      let result: CommentResult;
      try {
        result = parseComment(await options.createComment({ path: effect.path, key, text: effect.text }));
      } catch (e) {
        result = { success: false, error: e instanceof Error ? e.message : String(e) };
      }
      if (!result.success) {
        logger.warn(`Comment creation failed for ${key}:`, result.error);
      }
      await dispatch(effect.respond(result));
    };

    const dispatch = async (msg: Msg<P>): Promise<void> => {
      const { data, comments } = get();
      const next = update(definition, msg, comments, data);
      set({ data: next.data, comments: next.state });
      if (next.effect) await runEffect(next.effect);
    };

    return {
      data: options.data,
      comments: initState(options.pathToString, options.initialComments),
      dispatch,
      setData: (fn) => set((state) => ({ data: fn(state.data) })),
    };
  });

  return Object.assign(useStore, { definition });
}

/**
 * Dispatch for a child view that speaks in its own, narrower path type.
 */
export function focusDispatch<C, P>(
  inject: (path: C) => P,
  dispatch: (msg: Msg<P>) => Promise<void>
): (msg: Msg<C>) => Promise<void> {
  return (msg) => dispatch(mapMsg(inject, msg));
}
