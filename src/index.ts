/**
 * wysiwyg-kit - In-place editing for structured data
 *
 * Describe which leaves of a nested record/list value are editable text,
 * then read and edit them by path. Comment threads can be attached to any
 * path and are kept beside the data, keyed by the serialized path.
 *
 * Built on Zustand (editor store) + Zod (input validation).
 *
 * @packageDocumentation
 *
 * @example
 * ```typescript
 * import { createEditor, field, leafString, objectOf, edit } from 'wysiwyg-kit'
 *
 * type Page = { title: string }
 * type PagePath = { kind: 'title' }
 *
 * const title = field((page: Page) => page.title, (title, page) => ({ ...page, title }), leafString)
 * const page = objectOf<PagePath, Page>(() => title.at(undefined))
 * const author = { name: 'Ada', avatar: 'https://example.com/ada.png' }
 *
 * const usePage = createEditor(page, {
 *   data: { title: 'Pricing' },
 *   pathToString: (path) => path.kind,
 *   createComment: async ({ text }) => ({ content: text, author, createdAt: Date.now() }),
 * })
 *
 * await usePage.getState().dispatch(edit({ kind: 'title' }, 'New Title'))
 * ```
 */

// Definitions
export {
  leafString,
  leafInt,
  empty,
  field,
  objectOf,
  listOf,
  wholeList,
  listItem,
  inListItem,
  type Field,
  type FieldRoute,
} from './definition';

// Comment state
export {
  initState,
  focusState,
  threadKey,
  getComments,
  getDraft,
  isSaving,
  getCommentError,
  isFocused,
  isHovered,
} from './state';

// Reducer and messages
export {
  update,
  applyEditAction,
  mapAction,
  mapMsg,
  edit,
  deleteAt,
  draftChanged,
  submitDraft,
  focusComment,
  hoverCommentThread,
  unhoverCommentThread,
} from './update';

// Host runtime
export {
  createEditor,
  focusDispatch,
  type EditorHook,
  type EditorOptions,
  type EditorState,
  type CreateCommentRequest,
} from './editor';

export {
  commentSchema,
  commentThreadsSchema,
  parseComment,
  parseCommentThreads,
  type CommentThreads,
  type ThreadsResult,
} from './comment';

// Rendering
export { describeText, type TextView } from './view';
export { joinPath, listPathToString } from './path';
export { readText, syncText, type TextTarget } from './text';
export { EditableText, type EditableTextProps } from './react';

// Types
export type {
  LeafPath,
  EditOp,
  EditAction,
  Definition,
  ListPath,
  Comment,
  CommentAuthor,
  CommentResult,
  Msg,
  Effect,
  State,
  UpdateResult,
} from './types';
