/**
 * wysiwyg-kit - Core Types
 */

// Path of a scalar leaf: there is nothing left to drill into
export type LeafPath = undefined;

// Edit operation carried by an EditAction
export type EditOp =
  | { op: 'edit'; text: string }
  | { op: 'delete' };

// Edit operation addressed at a path
export type EditAction<P> = EditOp & { path: P };

/**
 * Reading and editing for every addressable leaf of a data shape `D`,
 * where `P` is the path type that addresses those leaves.
 */
export interface Definition<P, D> {
  applyEdit: (action: EditAction<P>, data: D) => D;
  getString: (path: P, data: D) => string | undefined;
}

// Path into a list: the list itself, one item, or a location inside one item
export type ListPath<P> =
  | { kind: 'list' }
  | { kind: 'item'; index: number }
  | { kind: 'child'; index: number; path: P };

export interface CommentAuthor {
  name: string;
  /** Avatar image URL */
  avatar: string;
}

export interface Comment {
  content: string;
  author: CommentAuthor;
  /** Epoch milliseconds */
  createdAt: number;
}

// Outcome of creating a comment
export type CommentResult =
  | { success: true; comment: Comment }
  | { success: false; error: string };

// Messages accepted by update()
export type Msg<P> =
  | { type: 'edit'; action: EditAction<P> }
  | { type: 'draftChanged'; path: P; text: string }
  | { type: 'submitDraft'; path: P }
  | { type: 'createCommentResponse'; path: P; result: CommentResult }
  | { type: 'focusComment'; path: P }
  | { type: 'hoverCommentThread'; path: P }
  | { type: 'unhoverCommentThread' };

// Side effects update() asks the host to perform
export type Effect<P> = {
  type: 'createComment';
  path: P;
  text: string;
  respond: (result: CommentResult) => Msg<P>;
};

/**
 * Comment threads and transient comment UI state, keyed by serialized path.
 */
export interface State<P> {
  readonly pathToString: (path: P) => string;
  readonly comments: ReadonlyMap<string, readonly Comment[]>;
  readonly unsavedComments: ReadonlyMap<string, string>;
  readonly savingComments: ReadonlySet<string>;
  readonly commentErrors: ReadonlyMap<string, string>;
  readonly focusedCommentThread: string | undefined;
  readonly hoveredCommentThread: string | undefined;
}

export interface UpdateResult<P, D> {
  data: D;
  state: State<P>;
  effect: Effect<P> | undefined;
}
