import { describe, expect, it } from 'vitest';
import { cleanFacebookTitle } from './title';

describe('cleanFacebookTitle', () => {
  it('drops view and reaction counters and the page name', () => {
    expect(cleanFacebookTitle('1.6M views · 62K reactions | Amazing sunset timelapse | Nature Page')).toBe(
      'Amazing sunset timelapse'
    );
  });

  it('drops a views-only counter', () => {
    expect(cleanFacebookTitle('12,345 views | Cooking pasta')).toBe('Cooking pasta');
  });

  it('cuts at the last full-width separator', () => {
    expect(cleanFacebookTitle('Street food tour ｜ Travel Page')).toBe('Street food tour');
  });

  it('keeps everything before the last separator', () => {
    expect(cleanFacebookTitle('Part 1 | Part 2 | Page')).toBe('Part 1 | Part 2');
  });

  it('leaves plain titles untouched apart from whitespace', () => {
    expect(cleanFacebookTitle('  Just a title  ')).toBe('Just a title');
    expect(cleanFacebookTitle('')).toBe('');
  });
});
