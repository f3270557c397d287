/**
 * wysiwyg-kit - React bindings
 */

import { useLayoutEffect, useRef } from 'react';
import { readText, syncText } from './text';

export interface EditableTextProps {
  value: string;
  /** Called with the full text after every input */
  onChange: (text: string) => void;
  onFocus?: () => void;
  className?: string;
}

/**
 * Inline content-editable text. The DOM is only touched when `value`
 * differs from what the node already shows, so typing keeps the caret.
 */
export function EditableText({ value, onChange, onFocus, className }: EditableTextProps) {
  const ref = useRef<HTMLSpanElement>(null);

  useLayoutEffect(() => {
    if (ref.current) syncText(ref.current, value);
  }, [value]);

  return (
    <span
      ref={ref}
      className={className}
      contentEditable
      suppressContentEditableWarning
      onInput={(e) => onChange(readText(e.currentTarget))}
      onFocus={onFocus}
    />
  );
}
