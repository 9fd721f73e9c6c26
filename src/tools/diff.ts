/**
 * Unified diff generation and application for file edit previews.
 * Line-level LCS over the region between the common prefix and suffix.
 */

const CONTEXT = 3;
const PREVIEW_LIMIT = 1000;
const NO_NEWLINE = '\\ No newline at end of file';

type DiffOp = { op: ' ' | '-' | '+'; line: string };

interface Hunk {
  oldStart: number;
  oldCount: number;
  newStart: number;
  newCount: number;
  ops: DiffOp[];
}

// Split keeping line terminators, so "a\nb" and "a\nb\n" stay distinguishable
export function splitLines(text: string): string[] {
  if (text === '') return [];
  return text.split(/(?<=\n)/);
}

function lcsOps(a: string[], b: string[]): DiffOp[] {
  const m = a.length;
  const n = b.length;
  const dp: number[][] = Array.from({ length: m + 1 }, () => new Array<number>(n + 1).fill(0));
  for (let i = m - 1; i >= 0; i--) {
    const row = dp[i] ?? [];
    const below = dp[i + 1] ?? [];
    for (let j = n - 1; j >= 0; j--) {
      row[j] = a[i] === b[j] ? (below[j + 1] ?? 0) + 1 : Math.max(below[j] ?? 0, row[j + 1] ?? 0);
    }
  }

  const ops: DiffOp[] = [];
  let i = 0;
  let j = 0;
  while (i < m && j < n) {
    const ai = a[i] ?? '';
    const bj = b[j] ?? '';
    if (ai === bj) {
      ops.push({ op: ' ', line: ai });
      i++;
      j++;
    } else if ((dp[i + 1]?.[j] ?? 0) >= (dp[i]?.[j + 1] ?? 0)) {
      ops.push({ op: '-', line: ai });
      i++;
    } else {
      ops.push({ op: '+', line: bj });
      j++;
    }
  }
  for (; i < m; i++) ops.push({ op: '-', line: a[i] ?? '' });
  for (; j < n; j++) ops.push({ op: '+', line: b[j] ?? '' });
  return ops;
}

function lineDiff(oldLines: string[], newLines: string[]): DiffOp[] {
  let prefix = 0;
  while (prefix < oldLines.length && prefix < newLines.length && oldLines[prefix] === newLines[prefix]) {
    prefix++;
  }
  let suffix = 0;
  while (
    suffix < oldLines.length - prefix &&
    suffix < newLines.length - prefix &&
    oldLines[oldLines.length - 1 - suffix] === newLines[newLines.length - 1 - suffix]
  ) {
    suffix++;
  }

  const head = oldLines.slice(0, prefix).map((line): DiffOp => ({ op: ' ', line }));
  const tail = oldLines.slice(oldLines.length - suffix).map((line): DiffOp => ({ op: ' ', line }));
  const middle = lcsOps(oldLines.slice(prefix, oldLines.length - suffix), newLines.slice(prefix, newLines.length - suffix));
  return [...head, ...middle, ...tail];
}

function buildHunks(ops: DiffOp[]): Hunk[] {
  const hunks: Hunk[] = [];
  let oldLine = 1;
  let newLine = 1;
  let current: Hunk | null = null;
  // Context lines seen since the last change in the open hunk
  let trailing = 0;

  for (let idx = 0; idx < ops.length; idx++) {
    const op = ops[idx];
    if (!op) continue;

    if (op.op === ' ') {
      if (current) {
        if (trailing < CONTEXT) {
          current.ops.push(op);
          current.oldCount++;
          current.newCount++;
          trailing++;
        } else {
          // Close the hunk unless another change follows within the context window
          const nextChange = ops.slice(idx, idx + CONTEXT + 1).findIndex(o => o.op !== ' ');
          if (nextChange === -1) {
            hunks.push(current);
            current = null;
          } else {
            current.ops.push(op);
            current.oldCount++;
            current.newCount++;
          }
        }
      }
      oldLine++;
      newLine++;
      continue;
    }

    if (!current) {
      const lead = Math.min(CONTEXT, idx, oldLine - 1, newLine - 1);
      const leading = ops.slice(idx - lead, idx);
      current = {
        oldStart: oldLine - lead,
        oldCount: lead,
        newStart: newLine - lead,
        newCount: lead,
        ops: [...leading],
      };
    }
    trailing = 0;
    current.ops.push(op);
    if (op.op === '-') {
      current.oldCount++;
      oldLine++;
    } else {
      current.newCount++;
      newLine++;
    }
  }

  if (current) hunks.push(current);
  return hunks;
}

function formatRange(start: number, count: number): string {
  if (count === 1) return `${start}`;
  // An empty range points at the line before it
  return `${count === 0 ? start - 1 : start},${count}`;
}

function formatLine(op: DiffOp): string {
  if (op.line.endsWith('\n')) return `${op.op}${op.line}`;
  return `${op.op}${op.line}\n${NO_NEWLINE}\n`;
}

/**
 * Unified diff between two texts, `--- a/<name>` / `+++ b/<name>` headers and
 * three lines of context. Empty string when the texts are equal.
 */
export function unifiedDiff(oldText: string, newText: string, fileName: string): string {
  if (oldText === newText) return '';
  const hunks = buildHunks(lineDiff(splitLines(oldText), splitLines(newText)));
  if (hunks.length === 0) return '';

  let out = `--- a/${fileName}\n+++ b/${fileName}\n`;
  for (const h of hunks) {
    out += `@@ -${formatRange(h.oldStart, h.oldCount)} +${formatRange(h.newStart, h.newCount)} @@\n`;
    out += h.ops.map(formatLine).join('');
  }
  return out;
}

// Fenced diff for approval prompts
export function formatDiffPreview(oldText: string, newText: string, fileName: string): string {
  let diff = unifiedDiff(oldText, newText, fileName);
  if (!diff) return '(no changes)';
  if (diff.length > PREVIEW_LIMIT) {
    diff = diff.slice(0, PREVIEW_LIMIT) + '\n... (diff truncated)';
  }
  return '```diff\n' + diff.replace(/\n$/, '') + '\n```';
}

const HUNK_HEADER = /^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@/;

/**
 * Apply a diff produced by `unifiedDiff` to `oldText`. Throws when a context
 * or removed line does not match the input.
 */
export function applyUnifiedDiff(oldText: string, diff: string): string {
  const source = splitLines(oldText);
  const lines = diff.split('\n');
  const out: string[] = [];
  let cursor = 0;
  let i = 0;

  while (i < lines.length && !(lines[i] ?? '').startsWith('@@')) i++;

  while (i < lines.length) {
    const header = HUNK_HEADER.exec(lines[i] ?? '');
    if (!header) {
      i++;
      continue;
    }
    const oldStart = Number(header[1]);
    const oldCount = header[2] === undefined ? 1 : Number(header[2]);
    const hunkStart = oldCount === 0 ? oldStart : oldStart - 1;

    while (cursor < hunkStart) {
      out.push(source[cursor] ?? '');
      cursor++;
    }
    i++;

    while (i < lines.length) {
      const raw = lines[i] ?? '';
      if (raw.startsWith('@@')) break;
      const tag = raw[0];
      if (tag !== ' ' && tag !== '-' && tag !== '+') {
        i++;
        continue;
      }
      let text = raw.slice(1);
      if (lines[i + 1] === NO_NEWLINE) {
        i++;
      } else {
        text += '\n';
      }

      if (tag === '+') {
        out.push(text);
      } else {
        const expected = source[cursor];
        if (expected !== text) {
          throw new Error(`Diff does not apply at line ${cursor + 1}`);
        }
        if (tag === ' ') out.push(text);
        cursor++;
      }
      i++;
    }
  }

  while (cursor < source.length) {
    out.push(source[cursor] ?? '');
    cursor++;
  }
  return out.join('');
}
