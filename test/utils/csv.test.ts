import { parseCsv, parseCsvLine } from '../../src/utils/csv';

describe('CSV Parsing', () => {
  describe('parseCsvLine', () => {
    it('should split on commas and trim values', () => {
      expect(parseCsvLine('a, b ,c')).toEqual(['a', 'b', 'c']);
    });

    it('should keep commas and escaped quotes inside quoted values', () => {
      expect(parseCsvLine('"Smith, J","say ""hi""",3')).toEqual(['Smith, J', 'say "hi"', '3']);
    });

    it('should keep trailing empty values', () => {
      expect(parseCsvLine('a,,')).toEqual(['a', '', '']);
    });
  });

  describe('parseCsv', () => {
    it('should accept mixed line endings and skip blank lines', () => {
      expect(parseCsv('h1,h2\r\n1,2\r\n\n3,4\r5,6\n')).toEqual([
        ['h1', 'h2'],
        ['1', '2'],
        ['3', '4'],
        ['5', '6'],
      ]);
    });

    it('should strip a byte order mark', () => {
      expect(parseCsv('\uFEFFDate,Player')).toEqual([['Date', 'Player']]);
    });

    it('should return nothing for empty content', () => {
      expect(parseCsv('')).toEqual([]);
    });
  });
});
