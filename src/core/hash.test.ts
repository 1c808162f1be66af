import { describe, it, expect } from 'vitest';
import { createJobId, hashContent } from './hash.js';

describe('hashing utilities', () => {
  describe('hashContent', () => {
    it('should generate a SHA-256 hash for string content', () => {
      const hash = hashContent('Hello, World!');

      // SHA-256 produces 64 hex characters
      expect(hash).toHaveLength(64);
      expect(/^[a-f0-9]+$/.test(hash)).toBe(true);
    });

    it('should handle empty string', () => {
      // Known SHA-256 of empty string
      expect(hashContent('')).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
    });

    it('should hash text and its UTF-8 bytes identically', () => {
      const text = 'def f():\n    return 1\n';
      expect(hashContent(new TextEncoder().encode(text))).toBe(hashContent(text));
    });
  });

  describe('createJobId', () => {
    const files = [
      { path: 'b.py', content: 'y = 2\n' },
      { path: 'a.py', content: 'x = 1\n' },
    ];

    it('should not depend on file order', () => {
      const forward = createJobId({ projectName: 'demo', files });
      const reversed = createJobId({ projectName: 'demo', files: [...files].reverse() });

      expect(forward).toBe(reversed);
    });

    it('should change with the project name', () => {
      expect(createJobId({ projectName: 'demo', files })).not.toBe(
        createJobId({ projectName: 'other', files })
      );
    });

    it('should change when any content changes', () => {
      const edited = [
        { path: 'b.py', content: 'y = 3\n' },
        { path: 'a.py', content: 'x = 1\n' },
      ];

      expect(createJobId({ projectName: 'demo', files })).not.toBe(
        createJobId({ projectName: 'demo', files: edited })
      );
    });
  });
});
