import { describe, test, expect } from 'vitest';
import { getMimetype, hashString } from './image-utils';

describe('getMimetype', () => {
  test('maps image extensions case-insensitively', () => {
    expect(getMimetype('/mnt/usb1/photoframe/Trip/beach.JPG')).toBe('image/jpeg');
    expect(getMimetype('a.jpeg')).toBe('image/jpeg');
    expect(getMimetype('a.png')).toBe('image/png');
    expect(getMimetype('a.heic')).toBe('image/heic');
    expect(getMimetype('a.tif')).toBe('image/tiff');
  });

  test('returns null for unknown or missing extensions', () => {
    expect(getMimetype('notes.txt')).toBeNull();
    expect(getMimetype('README')).toBeNull();
  });
});

describe('hashString', () => {
  test('returns the md5 hex digest', () => {
    expect(hashString('')).toBe('d41d8cd98f00b204e9800998ecf8427e');
    expect(hashString('/mnt/usb1/photoframe/a.jpg')).toMatch(/^[0-9a-f]{32}$/);
  });

  test('is stable for the same path', () => {
    expect(hashString('/mnt/usb1/photoframe/a.jpg')).toBe(hashString('/mnt/usb1/photoframe/a.jpg'));
    expect(hashString('/mnt/usb1/photoframe/a.jpg')).not.toBe(hashString('/mnt/usb1/photoframe/b.jpg'));
  });
});
