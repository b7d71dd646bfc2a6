import vocabulary from './vocabulary.json';
import { KeywordVocabulary, Verdict } from './types';

interface CompiledVocabulary {
  symbols: string[];
  fragments: string[];
  fragmentExceptions: RegExp | undefined;
  /** Space-padded so `includes` only hits whole words */
  terms: string[];
  scripture: RegExp;
}

const SEPARATORS = /[^\p{L}\p{N}]+/gu;
const PUNCTUATION = /[^\p{L}\p{N}\s]+/gu;

/** Lower case and strip accents: "Jésus" → "jesus" */
export function fold(text: string): string {
  return text.toLowerCase().normalize('NFKD').replace(/\p{M}+/gu, '');
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function toWords(folded: string): string {
  return ` ${folded.replace(SEPARATORS, ' ').trim()} `;
}

export function compileVocabulary(vocab: KeywordVocabulary): CompiledVocabulary {
  const names = [...vocab.books, ...vocab.bookAbbreviations]
    .map((name) => fold(name).trim())
    .filter(Boolean)
    // longest first so "song of songs" wins over shorter prefixes
    .sort((a, b) => b.length - a.length)
    .map((name) => escapeRegExp(name).replace(/\s+/g, '\\s+'));

  // [1-3] book number, name, optional ".", chapter:verse; not a clock time
  // such as "9:30am" or "9:30-5:30"
  const scripture = new RegExp(
    `(?<![\\p{L}\\p{N}])(?:[1-3]\\s*)?(?:${names.join('|')})\\.?\\s*[1-9]\\d{0,2}\\s*:\\s*[1-9]\\d{0,2}`
      + `(?!\\d|\\s*[ap]\\.?m(?![\\p{L}\\p{N}])|\\s*[-–]\\s*\\d{1,2}\\s*:\\s*\\d)`,
    'u',
  );

  const exceptions = vocab.fragmentExceptions
    .map((e) => fold(e).replace(SEPARATORS, ''))
    .filter(Boolean)
    .map(escapeRegExp);

  return {
    symbols: vocab.symbols,
    fragments: vocab.fragments.map((f) => fold(f).replace(SEPARATORS, '')).filter(Boolean),
    fragmentExceptions: exceptions.length > 0 ? new RegExp(exceptions.join('|'), 'g') : undefined,
    terms: vocab.terms.map((t) => toWords(fold(t))).filter((t) => t.trim().length > 0),
    scripture,
  };
}

const defaultVocabulary = compileVocabulary(vocabulary);

function hasPositiveSignal(bio: string, vocab: CompiledVocabulary): boolean {
  if (vocab.symbols.some((s) => bio.includes(s))) return true;

  const folded = fold(bio);
  // "J.E.S.U.S" and "#JesusFreak" collapse, separate words stay apart
  let unpunctuated = folded.replace(PUNCTUATION, '');
  if (vocab.fragmentExceptions) {
    unpunctuated = unpunctuated.replace(vocab.fragmentExceptions, ' ');
  }
  if (vocab.fragments.some((f) => unpunctuated.includes(f))) return true;

  const words = toWords(folded);
  if (vocab.terms.some((t) => words.includes(t))) return true;

  return vocab.scripture.test(folded);
}

/**
 * Keyword stage of the classifier. Pure: the same bio always yields the
 * same verdict, whatever the state of the LLM.
 *
 * - any positive signal → `yes`
 * - empty / whitespace-only → `no`
 * - anything else → `uncertain` (deferred to the LLM)
 */
export function quickCheck(bio: string, vocab: CompiledVocabulary = defaultVocabulary): Verdict {
  if (hasPositiveSignal(bio, vocab)) return 'yes';
  if (!bio.trim()) return 'no';
  return 'uncertain';
}
