/**
 * wysiwyg-kit - View helpers
 *
 * Everything a renderer needs to paint one text location.
 */

import type { Comment, Definition, State } from './types';
import { getCommentError, getComments, getDraft, isFocused, isHovered, isSaving, threadKey } from './state';

export interface TextView {
  /** Serialized path, stable across renders */
  key: string;
  /** Current text, or undefined when the path is not a text field */
  value: string | undefined;
  comments: readonly Comment[];
  draft: string;
  saving: boolean;
  error: string | undefined;
  focused: boolean;
  hovered: boolean;
}

export function describeText<P, D>(
  definition: Definition<P, D>,
  state: State<P>,
  data: D,
  path: P
): TextView {
  return {
    key: threadKey(state, path),
    value: definition.getString(path, data),
    comments: getComments(state, path),
    draft: getDraft(state, path),
    saving: isSaving(state, path),
    error: getCommentError(state, path),
    focused: isFocused(state, path),
    hovered: isHovered(state, path),
  };
}
