/**
 * wysiwyg-kit - Update
 *
 * The pure reducer behind an editor. It never performs I/O: creating a
 * comment is returned as an Effect and completed by feeding the matching
 * `createCommentResponse` message back in.
 */

import type { Definition, EditAction, Msg, State, UpdateResult } from './types';
import { removeEntry, setEntry, toggleKey } from './state';

export function applyEditAction<P, D>(definition: Definition<P, D>, action: EditAction<P>, data: D): D {
  return definition.applyEdit(action, data);
}

/**
 * Apply one message to the current data and comment state.
 */
export function update<P, D>(
  definition: Definition<P, D>,
  msg: Msg<P>,
  state: State<P>,
  data: D
): UpdateResult<P, D> {
  const unchanged: UpdateResult<P, D> = { data, state, effect: undefined };

  switch (msg.type) {
    case 'edit':
      return { data: definition.applyEdit(msg.action, data), state, effect: undefined };

    case 'draftChanged': {
      const key = state.pathToString(msg.path);
      return {
        data,
        state: {
          ...state,
          unsavedComments: setEntry(state.unsavedComments, key, msg.text),
          commentErrors: removeEntry(state.commentErrors, key),
        },
        effect: undefined,
      };
    }

    case 'submitDraft': {
      const key = state.pathToString(msg.path);
      const text = state.unsavedComments.get(key) ?? '';
      // Blank drafts never become comments; one request per thread at a time
      if (text.trim() === '' || state.savingComments.has(key)) return unchanged;

      const path = msg.path;
      return {
        data,
        state: {
          ...state,
          savingComments: toggleKey(state.savingComments, key, true),
          commentErrors: removeEntry(state.commentErrors, key),
        },
        effect: {
          type: 'createComment',
          path,
          text,
          respond: (result) => ({ type: 'createCommentResponse', path, result }),
        },
      };
    }

    case 'createCommentResponse': {
      const key = state.pathToString(msg.path);
      const saving = toggleKey(state.savingComments, key, false);

      if (!msg.result.success) {
        // Keep the draft so it can be submitted again
        return {
          data,
          state: {
            ...state,
            savingComments: saving,
            commentErrors: setEntry(state.commentErrors, key, msg.result.error),
          },
          effect: undefined,
        };
      }

      const thread = state.comments.get(key) ?? [];
      return {
        data,
        state: {
          ...state,
          comments: setEntry(state.comments, key, [...thread, msg.result.comment]),
          unsavedComments: removeEntry(state.unsavedComments, key),
          savingComments: saving,
          commentErrors: removeEntry(state.commentErrors, key),
        },
        effect: undefined,
      };
    }

    case 'focusComment':
      return {
        data,
        state: { ...state, focusedCommentThread: state.pathToString(msg.path) },
        effect: undefined,
      };

    case 'hoverCommentThread':
      return {
        data,
        state: { ...state, hoveredCommentThread: state.pathToString(msg.path) },
        effect: undefined,
      };

    case 'unhoverCommentThread':
      return { data, state: { ...state, hoveredCommentThread: undefined }, effect: undefined };
  }
}

// Path remapping

export function mapAction<C, P>(f: (path: C) => P, action: EditAction<C>): EditAction<P> {
  return action.op === 'edit'
    ? { op: 'edit', path: f(action.path), text: action.text }
    : { op: 'delete', path: f(action.path) };
}

export function mapMsg<C, P>(f: (path: C) => P, msg: Msg<C>): Msg<P> {
  switch (msg.type) {
    case 'edit':
      return { type: 'edit', action: mapAction(f, msg.action) };
    case 'draftChanged':
      return { type: 'draftChanged', path: f(msg.path), text: msg.text };
    case 'submitDraft':
      return { type: 'submitDraft', path: f(msg.path) };
    case 'createCommentResponse':
      return { type: 'createCommentResponse', path: f(msg.path), result: msg.result };
    case 'focusComment':
      return { type: 'focusComment', path: f(msg.path) };
    case 'hoverCommentThread':
      return { type: 'hoverCommentThread', path: f(msg.path) };
    case 'unhoverCommentThread':
      return msg;
  }
}

// Message constructors

export const edit = <P>(path: P, text: string): Msg<P> => ({
  type: 'edit',
  action: { op: 'edit', path, text },
});

export const deleteAt = <P>(path: P): Msg<P> => ({ type: 'edit', action: { op: 'delete', path } });

export const draftChanged = <P>(path: P, text: string): Msg<P> => ({ type: 'draftChanged', path, text });

export const submitDraft = <P>(path: P): Msg<P> => ({ type: 'submitDraft', path });

export const focusComment = <P>(path: P): Msg<P> => ({ type: 'focusComment', path });

export const hoverCommentThread = <P>(path: P): Msg<P> => ({ type: 'hoverCommentThread', path });

export const unhoverCommentThread = <P>(): Msg<P> => ({ type: 'unhoverCommentThread' });
