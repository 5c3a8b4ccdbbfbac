import { ArtifactFormatter } from '../ArtifactFormatter';

describe('ArtifactFormatter', () => {
  describe('render', () => {
    it('should lay out title, separator and blocks', () => {
      const text = ArtifactFormatter.render('X', [
        { type: 'heading', level: 2, text: 'S' },
        { type: 'paragraph', text: 'body' },
      ]);

      expect(text).toBe('Title: X\n' + '='.repeat(50) + '\n\n' + '## S\n\n' + 'body\n\n');
    });

    it('should write only the header for a page without blocks', () => {
      expect(ArtifactFormatter.render('Boş', [])).toBe(`Title: Boş\n${'='.repeat(50)}\n\n`);
    });

    it('should use one hash per heading level', () => {
      const text = ArtifactFormatter.render('T', [{ type: 'heading', level: 6, text: 'Deep' }]);
      expect(text.endsWith('###### Deep\n\n')).toBe(true);
    });
  });

  describe('fileName', () => {
    it('should zero-pad the counter to three digits', () => {
      expect(ArtifactFormatter.fileName(7, 'Ankara Kalesi')).toBe('007_Ankara_Kalesi.txt');
    });

    it('should widen the counter past 999', () => {
      expect(ArtifactFormatter.fileName(1234, 'Van')).toBe('1234_Van.txt');
    });

    it('should replace path separators', () => {
      expect(ArtifactFormatter.fileName(1, 'AC/DC\\live')).toBe('001_AC_DC_live.txt');
    });

    it('should fall back to a placeholder for a blank title', () => {
      expect(ArtifactFormatter.fileName(2, '   ')).toBe('002_untitled.txt');
    });

    it('should cut long titles to the byte limit', () => {
      const name = ArtifactFormatter.fileName(1, 'ş'.repeat(150));

      expect(name).toBe(`001_${'ş'.repeat(100)}.txt`);
      expect(Buffer.byteLength(name, 'utf-8')).toBe(208);
    });

    it('should not split a multi-byte character', () => {
      expect(ArtifactFormatter.sanitizeTitle(`a${'ğ'.repeat(150)}`)).toBe(`a${'ğ'.repeat(99)}`);
    });
  });
});
