import type { Edit } from '../types/schemas.js';
import { EditConflictError } from '../errors.js';

/**
 * Split content into lines, each keeping its own terminator.
 * "a\nb" → ["a\n", "b"]; "" → [].
 */
export function splitLines(content: string): string[] {
  const lines = content.match(/[^\r\n]*(?:\r\n|\r|\n)|[^\r\n]+$/g);
  return lines ?? [];
}

function lineEnding(line: string): string {
  if (line.endsWith('\r\n')) return '\r\n';
  if (line.endsWith('\n')) return '\n';
  if (line.endsWith('\r')) return '\r';
  return '';
}

/** Dominant terminator of the file; LF for files without one. */
export function detectLineEnding(content: string): string {
  const crlf = (content.match(/\r\n/g) ?? []).length;
  const lf = (content.match(/(?<!\r)\n/g) ?? []).length;
  return crlf > lf ? '\r\n' : '\n';
}

/**
 * Re-terminate payload lines with `eol`, and close the payload with
 * `trailing` unless it already ends a line.
 */
function renderPayload(payload: string, eol: string, trailing: string): string {
  if (payload === '') {
    return '';
  }
  const body = payload.replace(/\r\n|\r|\n/g, eol);
  return lineEnding(body) === '' ? body + trailing : body;
}

/** Lines an edit consumes from the original: empty for inserts. */
function consumedRange(edit: Edit): [number, number] {
  return edit.op === 'insert' ? [edit.start_line, edit.start_line - 1] : [edit.start_line, edit.end_line];
}

/**
 * Deterministic order used everywhere edits are sequenced: by the line
 * range each edit consumes, so an insert (which consumes nothing) sorts
 * ahead of a replace or delete starting on the same line.
 */
export function compareEdits(a: Edit, b: Edit): number {
  const [aStart, aEnd] = consumedRange(a);
  const [bStart, bEnd] = consumedRange(b);
  return aStart - bStart || aEnd - bEnd;
}

/** Stable sort by consumed range; the input is not mutated. */
export function sortEdits<T extends Edit>(edits: readonly T[]): T[] {
  return edits
    .map((edit, position) => ({ edit, position }))
    .sort((a, b) => compareEdits(a.edit, b.edit) || a.position - b.position)
    .map(({ edit }) => edit);
}

/**
 * Apply line edits to `content`. Line numbers refer to the original
 * content, so every edit is positioned independently of the others.
 *
 * - replace: lines start..end (inclusive) become the payload
 * - insert: the payload goes before line `start_line` (lines + 1 appends)
 * - delete: lines start..end are removed
 *
 * @throws EditConflictError for out-of-range or overlapping edits
 */
export function applyEdits(content: string, edits: readonly Edit[]): string {
  if (edits.length === 0) {
    return content;
  }

  const lines = splitLines(content);
  const eol = detectLineEnding(content);
  const ordered = sortEdits(edits);

  let previousEnd = 0;
  for (const edit of ordered) {
    const [start, end] = consumedRange(edit);
    const limit = edit.op === 'insert' ? lines.length + 1 : lines.length;
    if (start > limit || end > lines.length) {
      throw new EditConflictError(
        `Edit ${edit.op} ${edit.start_line}-${edit.end_line} is outside ${edit.file} (${lines.length} lines)`
      );
    }
    if (start <= previousEnd) {
      throw new EditConflictError(
        `Edit ${edit.op} ${edit.start_line}-${edit.end_line} overlaps a previous edit in ${edit.file}`
      );
    }
    previousEnd = Math.max(previousEnd, end);
  }

  // Bottom-up, so earlier line numbers stay valid
  const result = [...lines];
  for (let i = ordered.length - 1; i >= 0; i--) {
    const edit = ordered[i];
    const [start, end] = consumedRange(edit);
    const count = end - start + 1;

    if (edit.op === 'delete') {
      result.splice(start - 1, count);
      continue;
    }

    if (edit.op === 'insert') {
      const atEof = start === lines.length + 1;
      const last = lines[lines.length - 1];
      let text = renderPayload(edit.payload, eol, eol);
      if (atEof && last !== undefined && lineEnding(last) === '') {
        // Appending after an unterminated last line: terminate it first
        text = eol + (lineEnding(text) === eol ? text.slice(0, -eol.length) : text);
      }
      result.splice(start - 1, 0, text);
      continue;
    }

    const lastReplaced = lines[end - 1] ?? '';
    result.splice(start - 1, count, renderPayload(edit.payload, eol, lineEnding(lastReplaced)));
  }

  return result.join('');
}
