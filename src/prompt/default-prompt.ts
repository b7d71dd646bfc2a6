/** Marker replaced by the numbered bio list when a request is rendered */
export const BIOS_PLACEHOLDER = '{{bios}}';

/**
 * Reply format the parser reads. Appended to every request after the bios,
 * so an edited prompt cannot drop it.
 */
export const ANSWER_FORMAT = 'Answer with exactly one line per bio, using the same number as the bio, '
  + 'in the form "1) yes" or "2) no". Do not add any other text.';

export const DEFAULT_PROMPT = [
  'For each numbered Instagram bio below, reply yes or no.',
  '',
  'Say yes if the bio contains an explicit Christian signal, e.g. the words Jesus, Christ, Christian, Bible, '
    + 'a Scripture reference (John 3:16, 1 Cor 13:4-8, etc.), a ✝️ cross emoji, "saved by grace", '
    + '"follower of Christ", or similar.',
  '',
  'If the bio does not clearly show Christian affiliation, say no.',
  '',
  'Bios:',
  BIOS_PLACEHOLDER,
].join('\n');
