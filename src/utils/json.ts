/**
 * Locates the first balanced JSON object inside free-form model output.
 *
 * Scanner states:
 *   outside  — before the first `{`
 *   object   — inside the object at nesting depth N
 *   string   — inside a JSON string literal (braces are ignored here)
 *   escape   — the character after a backslash inside a string
 */

type ScanState =
  | { mode: 'outside' }
  | { mode: 'object'; depth: number }
  | { mode: 'string'; depth: number }
  | { mode: 'escape'; depth: number };

/**
 * Returns the text of the first balanced `{...}` object, or null when the
 * first `{` is never closed. Text before and after the object is ignored.
 */
export function extractJsonObject(text: string): string | null {
  let state: ScanState = { mode: 'outside' };
  let start = -1;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    switch (state.mode) {
      case 'outside':
        if (ch === '{') {
          start = i;
          state = { mode: 'object', depth: 1 };
        }
        break;
      case 'object':
        if (ch === '"') {
          state = { mode: 'string', depth: state.depth };
        } else if (ch === '{') {
          state = { mode: 'object', depth: state.depth + 1 };
        } else if (ch === '}') {
          if (state.depth === 1) return text.slice(start, i + 1);
          state = { mode: 'object', depth: state.depth - 1 };
        }
        break;
      case 'string':
        if (ch === '\\') state = { mode: 'escape', depth: state.depth };
        else if (ch === '"') state = { mode: 'object', depth: state.depth };
        break;
      case 'escape':
        state = { mode: 'string', depth: state.depth };
        break;
    }
  }
  return null;
}
