import { describe, it, expect } from 'vitest';

import { identityKey, normalizeUrl } from '../src/crawler/identity';

describe('normalizeUrl', () => {
  it('lower-cases the host, drops default port, fragment and trailing slash, sorts params', () => {
    expect(normalizeUrl('https://Directory.TEST:443/Details/?b=2&a=1#top')).toBe(
      'https://directory.test/Details?a=1&b=2'
    );
  });

  it('drops utm_* params but keeps the others', () => {
    expect(normalizeUrl('https://directory.test/details?id=3&utm_source=mail&utm_medium=x')).toBe(
      'https://directory.test/details?id=3'
    );
  });

  it('resolves relative links against the page URL', () => {
    expect(normalizeUrl('/details?id=1', 'https://directory.test/results?page=2')).toBe(
      'https://directory.test/details?id=1'
    );
  });

  it('keeps the root path', () => {
    expect(normalizeUrl('https://directory.test/')).toBe('https://directory.test/');
  });

  it('rejects non-http and unparsable links', () => {
    expect(normalizeUrl('javascript:void(0)')).toBeNull();
    expect(normalizeUrl('mailto:help@directory.test')).toBeNull();
    expect(normalizeUrl('http://')).toBeNull();
  });
});

describe('identityKey', () => {
  const record = { 'Service Name': 'Food Pantry', 'Service ID': '42' };

  it('derives the same key for URL variants of one record', () => {
    expect(identityKey(record, 'https://directory.test/details/?id=1#x')).toBe(
      identityKey(record, 'https://directory.test/details?id=1')
    );
    expect(identityKey(record, 'https://directory.test/details?id=1')).toBe(
      'url:https://directory.test/details?id=1'
    );
  });

  it('prefers a site-provided id field when configured', () => {
    expect(identityKey(record, 'https://directory.test/details?id=1', 'Service ID')).toBe('id:42');
  });

  it('falls back to the URL when the id field is empty', () => {
    expect(identityKey({ 'Service ID': null }, 'https://directory.test/details?id=9', 'Service ID')).toBe(
      'url:https://directory.test/details?id=9'
    );
  });
});
