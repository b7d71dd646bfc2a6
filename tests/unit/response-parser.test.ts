import { parseNumberedLabels } from '../../src/classification/response-parser';

describe('parseNumberedLabels', () => {
  describe('numbered lines', () => {
    it('should read one label per numbered line', () => {
      expect(parseNumberedLabels('1) yes\n2) no\n3) YES', 3)).toEqual(['yes', 'no', 'yes']);
    });

    it('should tolerate markdown emphasis and CRLF line endings', () => {
      expect(parseNumberedLabels('**1.** Yes\r\n**2.** **No**', 2)).toEqual(['yes', 'no']);
    });

    it('should match by number, not by line order', () => {
      expect(parseNumberedLabels('2: no\n1: yes', 2)).toEqual(['yes', 'no']);
    });

    it('should skip preamble lines without a number', () => {
      expect(parseNumberedLabels('Here are the answers:\n1) yes', 1)).toEqual(['yes']);
    });

    it('should handle multi-digit numbers', () => {
      const reply = Array.from({ length: 10 }, (_, i) => `${i + 1}. ${i === 9 ? 'yes' : 'no'}`).join('\n');
      const labels = parseNumberedLabels(reply, 10);
      expect(labels[9]).toBe('yes');
      expect(labels[0]).toBe('no');
    });
  });

  describe('unusable lines', () => {
    it('should discard the whole reply when a number is missing', () => {
      expect(parseNumberedLabels('1) yes\n3) no', 3)).toEqual([null, null, null]);
    });

    it('should discard a reply cut short', () => {
      expect(parseNumberedLabels('1) yes\n2) no\n3', 4)).toEqual([null, null, null, null]);
    });

    it('should keep the other labels when one numbered line is unreadable', () => {
      expect(parseNumberedLabels('1) yes\n2) maybe\n3) no', 3)).toEqual(['yes', null, 'no']);
    });

    it('should treat a duplicated number as unparseable', () => {
      expect(parseNumberedLabels('1: yes\n1: no\n2: no', 2)).toEqual([null, 'no']);
    });

    it('should ignore out-of-range numbers', () => {
      expect(parseNumberedLabels('0) yes\n3) yes\n1) no\n2) yes', 2)).toEqual(['no', 'yes']);
    });

    it('should reject a line carrying both answers', () => {
      expect(parseNumberedLabels('1) yes, no idea', 1)).toEqual([null]);
    });
  });

  describe('space-separated replies', () => {
    it('should take labels by position when nothing is numbered', () => {
      expect(parseNumberedLabels('yes no yes', 3)).toEqual(['yes', 'no', 'yes']);
      expect(parseNumberedLabels('Yes, No.', 2)).toEqual(['yes', 'no']);
    });

    it('should give up when the count differs', () => {
      expect(parseNumberedLabels('yes no', 3)).toEqual([null, null, null]);
    });

    it('should give up on anything but yes/no tokens', () => {
      expect(parseNumberedLabels('yes maybe', 2)).toEqual([null, null]);
      expect(parseNumberedLabels('', 2)).toEqual([null, null]);
    });
  });
});
