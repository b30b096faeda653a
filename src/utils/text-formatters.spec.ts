import { formatWithDelimiters, humanizeFileName, normalizeWhitespace } from './text-formatters';

describe('text-formatters', () => {
  describe('formatWithDelimiters', () => {
    it('should title-case words split on hyphens and underscores', () => {
      expect(formatWithDelimiters('lab-safety_rules')).toBe('Lab Safety Rules');
    });

    it('should ignore repeated delimiters', () => {
      expect(formatWithDelimiters('unit--two')).toBe('Unit Two');
    });
  });

  describe('humanizeFileName', () => {
    it('should drop directory and extension', () => {
      expect(humanizeFileName('wiki_content/week_1-overview.html')).toBe('Week 1 Overview');
    });

    it('should accept backslash separators', () => {
      expect(humanizeFileName('extra\\speaker_notes.xml')).toBe('Speaker Notes');
    });

    it('should keep names without an extension', () => {
      expect(humanizeFileName('readme')).toBe('Readme');
    });
  });

  describe('normalizeWhitespace', () => {
    it('should collapse runs and trim', () => {
      expect(normalizeWhitespace('  Cell\n\t Biology  ')).toBe('Cell Biology');
    });
  });
});
