import { IdRegistry, normalizeId, recoveredEntityId } from './id-generator';

describe('id-generator', () => {
  describe('normalizeId', () => {
    it('should convert parts to lowercase kebab-case', () => {
      expect(normalizeId(['Week', 'One', 'Overview'])).toBe('week-one-overview');
    });

    it('should collapse separators and trim hyphens', () => {
      expect(normalizeId(['_wiki__content/', 'Intro.html'])).toBe('wiki-content-intro-html');
    });

    it('should drop empty parts', () => {
      expect(normalizeId(['', 'notes', ''])).toBe('notes');
    });
  });

  describe('recoveredEntityId', () => {
    it('should derive the id from the path', () => {
      expect(recoveredEntityId('notes.xml')).toMatch(/^recovered-notes-xml-[0-9a-f]{8}$/);
    });

    it('should be stable across calls', () => {
      expect(recoveredEntityId('extra/slides.xml')).toBe(recoveredEntityId('extra/slides.xml'));
    });

    it('should keep paths that normalize alike apart', () => {
      expect(recoveredEntityId('a_b.xml')).not.toBe(recoveredEntityId('a-b.xml'));
    });
  });

  describe('IdRegistry', () => {
    it('should return the base id the first time', () => {
      const registry = new IdRegistry();
      expect(registry.claim('lesson:a')).toBe('lesson:a');
      expect(registry.has('lesson:a')).toBe(true);
    });

    it('should suffix repeats in claim order', () => {
      const registry = new IdRegistry();
      registry.claim('lesson:a');
      expect(registry.claim('lesson:a')).toBe('lesson:a~2');
      expect(registry.claim('lesson:a')).toBe('lesson:a~3');
    });

    it('should skip suffixes that are already taken', () => {
      const registry = new IdRegistry();
      registry.claim('lesson:a~2');
      registry.claim('lesson:a');
      expect(registry.claim('lesson:a')).toBe('lesson:a~3');
    });
  });
});
