import { compileVocabulary, fold, quickCheck } from '../../src/classification/keyword-classifier';

describe('quickCheck', () => {
  describe('positive signals', () => {
    it('should flag explicit faith words', () => {
      expect(quickCheck('Jesus is my savior')).toBe('yes');
      expect(quickCheck('Christian, wife, mom')).toBe('yes');
      expect(quickCheck('GOD FIRST')).toBe('yes');
    });

    it('should flag cross symbols, including emoji presentation', () => {
      expect(quickCheck('✝️')).toBe('yes');
      expect(quickCheck('runner † coffee')).toBe('yes');
    });

    it('should ignore punctuation and case inside a word', () => {
      expect(quickCheck('Follower of J.E.S.U.S')).toBe('yes');
      expect(quickCheck('#JesusFreak')).toBe('yes');
    });

    it('should match multi-word terms across hyphens', () => {
      expect(quickCheck('Born-again since 2010')).toBe('yes');
    });

    it('should fold accents before matching', () => {
      expect(quickCheck('Jésus')).toBe('yes');
    });

    it('should recognise scripture references', () => {
      expect(quickCheck('John 3:16')).toBe('yes');
      expect(quickCheck('1 Cor 13:4-8')).toBe('yes');
      expect(quickCheck('Ps. 23:1 🌿')).toBe('yes');
      expect(quickCheck('Mark 9:23-24')).toBe('yes');
    });

    it('should still flag faith words next to an excepted name', () => {
      expect(quickCheck('Christmas lover, Christian')).toBe('yes');
      expect(quickCheck('#ChristInMe')).toBe('yes');
    });
  });

  describe('no signal', () => {
    it('should defer ordinary bios to the LLM', () => {
      expect(quickCheck('Coffee lover')).toBe('uncertain');
    });

    it('should not join separate words into a keyword', () => {
      expect(quickCheck('Chris Tucker, runner')).toBe('uncertain');
    });

    it('should only match terms as whole words', () => {
      expect(quickCheck('Goddess energy')).toBe('uncertain');
      expect(quickCheck('CrossFit coach')).toBe('uncertain');
    });

    it('should not treat a book name without chapter:verse as a reference', () => {
      expect(quickCheck('Mark, photographer')).toBe('uncertain');
      expect(quickCheck('Day job 9:00-5:00')).toBe('uncertain');
    });

    it('should not read clock times after a book name as a reference', () => {
      expect(quickCheck('Day job 9:30-5:30')).toBe('uncertain');
      expect(quickCheck('Mark 9:15am at the gym')).toBe('uncertain');
    });

    it('should not flag names and words that merely contain "christ"', () => {
      expect(quickCheck('Christopher, photographer')).toBe('uncertain');
      expect(quickCheck('Merry Christmas')).toBe('uncertain');
      expect(quickCheck('Christina | NYC')).toBe('uncertain');
    });

    it('should defer emoji-only bios', () => {
      expect(quickCheck('😀')).toBe('uncertain');
    });
  });

  describe('empty input', () => {
    it('should label empty and whitespace-only bios "no"', () => {
      expect(quickCheck('')).toBe('no');
      expect(quickCheck('   \n\t')).toBe('no');
    });
  });

  it('should be deterministic', () => {
    const bios = ['Jesus is my savior', 'Coffee lover', '', '😀'];
    expect(bios.map((b) => quickCheck(b))).toEqual(bios.map((b) => quickCheck(b)));
  });

  describe('custom vocabulary', () => {
    const vocab = compileVocabulary({
      symbols: ['☮'],
      fragments: ['peace'],
      fragmentExceptions: [],
      terms: ['love wins'],
      books: ['song of songs'],
      bookAbbreviations: [],
    });

    it('should use only the supplied vocabulary', () => {
      expect(quickCheck('☮', vocab)).toBe('yes');
      expect(quickCheck('#PeaceOut', vocab)).toBe('yes');
      expect(quickCheck('love-wins', vocab)).toBe('yes');
      expect(quickCheck('Song of Songs 2:4', vocab)).toBe('yes');
      expect(quickCheck('Jesus', vocab)).toBe('uncertain');
    });
  });
});

describe('fold', () => {
  it('should lower-case and strip combining marks', () => {
    expect(fold('Ésaïe ÇA')).toBe('esaie ca');
  });
});
