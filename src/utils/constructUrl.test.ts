import { describe, expect, it } from 'vitest';
import { constructUrl } from './constructUrl.js';

describe('constructUrl', () => {
  it('returns the bare path without a query', () => {
    expect(constructUrl('/users')).toBe('/users');
    expect(constructUrl('/users', {})).toBe('/users');
  });

  it('stringifies values in insertion order', () => {
    expect(constructUrl('/bonuses', { skip: 0, limit: 10, include_children: true, hashtag: '#teamwork' })).toBe(
      '/bonuses?skip=0&limit=10&include_children=true&hashtag=%23teamwork',
    );
  });

  it('drops undefined and null values', () => {
    expect(constructUrl('/users', { email: undefined, show_financial_data: null, limit: 5 })).toBe('/users?limit=5');
  });

  it('returns the bare path when every value is dropped', () => {
    expect(constructUrl('/users', { email: undefined })).toBe('/users');
  });
});
