/**
 * Unit Tests — Dataset Name Sanitization
 *
 * Collection names reach the filesystem straight from URLs, so every
 * escape route is checked here along with the normalisation that makes
 * "iShares" and "ishares" the same dataset.
 */
import path from 'path';

import { resolveWithin, sanitize } from '@infrastructure/storage/sanitize';
import { InvalidNameError } from '@shared/errors/AppError';

describe('sanitize()', () => {
  it('should trim and lower-case accepted names', () => {
    expect(sanitize('First-Trust_1')).toBe('first-trust_1');
    expect(sanitize('Goldman Sachs')).toBe('goldman sachs');
    expect(sanitize('iShares ')).toBe('ishares');
  });

  it.each([
    ['../etc/passwd'],
    ['a/b'],
    ['a\\b'],
    ['..'],
    [''],
    ['-leading'],
    [' leading-space'],
    ['dots.are.out'],
    ['x'.repeat(101)],
    ['listing_part0'],
    ['listing_metadata'],
  ])('should reject %p', (name) => {
    expect(() => sanitize(name)).toThrow(InvalidNameError);
  });

  it('should accept a name of exactly 100 characters', () => {
    expect(sanitize('A'.repeat(100))).toBe('a'.repeat(100));
  });

  it('should say why a name was rejected', () => {
    expect(() => sanitize('a/b')).toThrow('Invalid name "a/b": must not contain "..", "/" or "\\"');
  });
});

describe('resolveWithin()', () => {
  const root = path.resolve('/srv/lake');

  it('should join names under the root', () => {
    expect(resolveWithin(root, 'ishares', 'listing.json')).toBe(
      path.join(root, 'ishares', 'listing.json'),
    );
  });

  it('should refuse paths that leave the root or are the root itself', () => {
    expect(() => resolveWithin(root, '..', 'other')).toThrow(InvalidNameError);
    expect(() => resolveWithin(root, '/etc')).toThrow(InvalidNameError);
    expect(() => resolveWithin(root, '.')).toThrow(InvalidNameError);
  });
});
