/**
 * Use-case tests for the editor: short editing sessions as a host would drive them.
 */

import { describe, it, expect, vi } from 'vitest';
import type { Editor } from '../../types/editor.ts';
import { position } from '../core/text-buffer.ts';
import { createEditor } from './editor.ts';
import { EditorIntents } from './intents.ts';

function type(editor: Editor, text: string): void {
  for (const char of text) {
    editor.dispatch(EditorIntents.characterInput(char));
  }
}

describe('Editing sessions', () => {
  it('should track the saved state through edits and undo', () => {
    const editor = createEditor({ content: 'Draft' });
    editor.dispatch(EditorIntents.documentEnd());
    type(editor, ' one');
    expect(editor.isModified()).toBe(true);

    editor.markSaved();
    expect(editor.isModified()).toBe(false);

    type(editor, '!');
    expect(editor.content()).toBe('Draft one!');
    expect(editor.isModified()).toBe(true);

    editor.dispatch(EditorIntents.undo());
    expect(editor.content()).toBe('Draft one');
    expect(editor.isModified()).toBe(false);
  });

  it('should edit wide and astral characters by column', () => {
    const editor = createEditor();
    type(editor, '安全');
    editor.dispatch(EditorIntents.enter());
    type(editor, '😀ok');
    expect(editor.content()).toBe('安全\n😀ok');
    expect(editor.getSnapshot().cursor).toEqual(position(1, 3));

    editor.dispatch(EditorIntents.backspace());
    editor.dispatch(EditorIntents.backspace());
    editor.dispatch(EditorIntents.backspace());
    expect(editor.content()).toBe('安全\n');
    expect(editor.getSnapshot().cursor).toEqual(position(1, 0));

    editor.dispatch(EditorIntents.backspace());
    expect(editor.content()).toBe('安全');
    expect(editor.getSnapshot().cursor).toEqual(position(0, 2));

    editor.dispatch(EditorIntents.undo());
    expect(editor.content()).toBe('安全\n');
  });

  it('should copy and paste through the host clipboard', () => {
    const editor = createEditor({ content: 'hello' });
    let clipboard = '';
    let requested = false;
    editor.addEventListener('clipboard-write', (event) => {
      clipboard = event.text;
    });
    editor.addEventListener('clipboard-request', () => {
      requested = true;
    });

    editor.dispatch(EditorIntents.selectAll());
    editor.dispatch(EditorIntents.copy());
    editor.dispatch(EditorIntents.documentEnd());
    editor.dispatch(EditorIntents.paste());
    expect(requested).toBe(true);
    editor.dispatch(EditorIntents.paste(clipboard));

    expect(editor.content()).toBe('hellohello');
    expect(editor.getSnapshot().cursor).toEqual(position(0, 10));
  });

  it('should rename an identifier with replace all', () => {
    const editor = createEditor({ content: 'let a = 1;\nlet b = a + a;' });
    const onSearch = vi.fn();
    editor.addEventListener('search-change', onSearch);

    editor.dispatch(EditorIntents.openReplace());
    editor.dispatch(EditorIntents.searchQueryChanged('a'));
    expect(editor.getSnapshot().search.matches).toHaveLength(3);

    editor.dispatch(EditorIntents.replaceTextChanged('x'));
    editor.dispatch(EditorIntents.replaceAll());
    expect(editor.content()).toBe('let x = 1;\nlet b = x + x;');
    expect(editor.getSnapshot().search.matches).toHaveLength(0);
    expect(editor.getSnapshot().search.isReplaceMode).toBe(true);

    editor.dispatch(EditorIntents.undo());
    expect(editor.content()).toBe('let a = 1;\nlet b = a + a;');
    expect(editor.getSnapshot().search.matches).toHaveLength(3);
    expect(onSearch).toHaveBeenCalled();
  });

  it('should keep rendering state in step while scrolling a long document', () => {
    const content = Array.from({ length: 500 }, (_, i) => `line ${i}`).join('\n');
    const editor = createEditor({ content });

    editor.dispatch(EditorIntents.scrolled(4000, 800, 600));
    const visible = editor.visibleLines();
    expect(visible[0]).toEqual({ lineNumber: 136, content: 'line 136' });
    expect(visible).toHaveLength(160);
    expect(editor.pointToPosition({ x: 60, y: 10 })).toEqual(position(200, 0));
  });
});
