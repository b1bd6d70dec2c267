import { createHash } from 'crypto';
import { fingerprint, stableId } from '../utils/hash';
import { normalizeStreet, normalizeUnit } from '../utils/address';
import { PhotoCollector } from '../utils/photo-collector';

const sha1 = (value: string) => createHash('sha1').update(value).digest('hex');

describe('stableId', () => {
  it('hashes the non-empty parts joined with "|"', () => {
    expect(stableId('redfin', '123')).toBe(sha1('redfin|123'));
    expect(stableId('redfin', '', null, '123')).toBe(sha1('redfin|123'));
  });

  it('is a 40-character hex digest', () => {
    expect(stableId('zillow', 'https://a.test')).toMatch(/^[0-9a-f]{40}$/);
  });
});

describe('fingerprint', () => {
  it('keeps empty slots', () => {
    expect(fingerprint([null, 'a', undefined, 2])).toBe(sha1('|a||2'));
  });
});

describe('address normalization', () => {
  it('abbreviates street words and drops the unit designation', () => {
    expect(normalizeStreet('123 North Main Street Apt 4B')).toBe('123 n main st');
    expect(normalizeStreet('500 Oak  Avenue, ')).toBe('500 oak ave');
    expect(normalizeStreet('9 Elm St #3')).toBe('9 elm st');
  });

  it('strips unit prefixes', () => {
    expect(normalizeUnit('Apt 4B')).toBe('4b');
    expect(normalizeUnit('#12')).toBe('12');
  });
});

describe('PhotoCollector', () => {
  it('dedupes by exact URL and stops at the cap', () => {
    const photos = new PhotoCollector(2);
    ['a', 'a', 'b', 'c'].forEach((url) => photos.add(url));
    expect(photos.toArray()).toEqual(['a', 'b']);
    expect(photos.isFull()).toBe(true);
  });
});
