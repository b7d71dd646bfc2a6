import { Label } from './types';

const EMPHASIS = /[*_`~]/g;
const LEADING_NUMBER = /^[\s#([\-•.>]*(\d+)(?!\d)/;
const LABEL_TOKEN = /\b(yes|no)\b/gi;
const LIST_SEPARATORS = /[\s,;]+/;

function labelsIn(text: string): Label[] {
  const found = new Set<Label>();
  for (const match of text.matchAll(LABEL_TOKEN)) {
    found.add(match[1].toLowerCase() === 'yes' ? 'yes' : 'no');
  }
  return Array.from(found);
}

/** Reply of the form "yes no yes", taken by position */
function parsePositional(text: string, expected: number): Array<Label | null> | undefined {
  const tokens = text.replace(EMPHASIS, ' ').trim().split(LIST_SEPARATORS).filter(Boolean);
  if (tokens.length !== expected) return undefined;

  const labels: Label[] = [];
  for (const token of tokens) {
    const lower = token.replace(/[.!]+$/, '').toLowerCase();
    if (lower !== 'yes' && lower !== 'no') return undefined;
    labels.push(lower);
  }
  return labels;
}

/**
 * Parse an LLM reply that labels numbered bios, one per line
 * ("1) yes", "**2.** No", "3: YES").
 *
 * Returns one entry per expected bio; `null` where the reply gave no usable
 * label. A number claimed by more than one line is left `null`, and numbers
 * outside 1..expected are ignored. A reply that does not number every bio
 * (cut short, or answering a different count) is unusable as a whole and
 * yields all `null`.
 */
export function parseNumberedLabels(text: string, expected: number): Array<Label | null> {
  const labels: Array<Label | null> = new Array<Label | null>(expected).fill(null);
  const seen = new Map<number, number>();
  let numberedLines = 0;

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.replace(EMPHASIS, ' ');
    const numbered = LEADING_NUMBER.exec(line);
    if (!numbered) continue;
    numberedLines++;

    const position = parseInt(numbered[1], 10);
    if (position < 1 || position > expected) continue;

    const count = (seen.get(position) ?? 0) + 1;
    seen.set(position, count);
    if (count > 1) {
      labels[position - 1] = null;
      continue;
    }

    const found = labelsIn(line.slice(numbered[0].length));
    labels[position - 1] = found.length === 1 ? found[0] : null;
  }

  if (numberedLines === 0) {
    return parsePositional(text, expected) ?? labels;
  }
  if (seen.size !== expected) {
    return labels.fill(null);
  }
  return labels;
}
