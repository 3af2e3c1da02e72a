import { describe, it, expect } from 'vitest';
import { normalizeNextLink, readNextLink, serviceUrlVariants } from '../../src/query/next-link.js';
import { SERVICE_URL, feedXml } from './helpers.js';

describe('serviceUrlVariants', () => {
  it('returns the http and https forms of an http URL', () => {
    expect(serviceUrlVariants('http://example.test/svc')).toEqual([
      'http://example.test/svc',
      'https://example.test/svc',
    ]);
  });

  it('returns the http and https forms of an https URL', () => {
    expect(serviceUrlVariants('https://example.test/svc')).toEqual([
      'http://example.test/svc',
      'https://example.test/svc',
    ]);
  });
});

describe('normalizeNextLink', () => {
  it('strips the service URL on the same scheme', () => {
    expect(normalizeNextLink('http://example.test/svc/Products?$skiptoken=5', 'http://example.test/svc'))
      .toBe('/Products?$skiptoken=5');
  });

  it('strips the service URL when the scheme drifted to https', () => {
    expect(normalizeNextLink('https://example.test/svc/Products?$skiptoken=5', 'http://example.test/svc'))
      .toBe('/Products?$skiptoken=5');
  });

  it('strips the service URL when the scheme drifted to http', () => {
    expect(normalizeNextLink('http://example.test/svc/Products?$skiptoken=5', 'https://example.test/svc'))
      .toBe('/Products?$skiptoken=5');
  });

  it('leaves relative links untouched', () => {
    expect(normalizeNextLink('Products?$skiptoken=5', 'http://example.test/svc')).toBe('Products?$skiptoken=5');
  });

  it('leaves a sibling path that shares the service URL as a prefix untouched', () => {
    expect(normalizeNextLink('http://example.test/svc2/Products', 'http://example.test/svc'))
      .toBe('http://example.test/svc2/Products');
  });

  it('strips the service URL only at the start of the link', () => {
    const href = 'http://mirror.test/proxy?target=http://example.test/svc/Products';
    expect(normalizeNextLink(href, 'http://example.test/svc')).toBe(href);
  });

  it('strips a service URL followed directly by a query', () => {
    expect(normalizeNextLink('https://example.test/svc?$skiptoken=5', 'http://example.test/svc')).toBe('?$skiptoken=5');
  });

  it('leaves links to another host untouched', () => {
    expect(normalizeNextLink('http://other.test/svc/Products?$skiptoken=5', 'http://example.test/svc'))
      .toBe('http://other.test/svc/Products?$skiptoken=5');
  });
});

describe('readNextLink', () => {
  it('returns undefined when the feed has no next link', () => {
    expect(readNextLink(feedXml([{ id: 1, name: 'Bread' }]), SERVICE_URL)).toBeUndefined();
  });

  it('reads and normalizes the feed-level next link', () => {
    const body = feedXml([], `${SERVICE_URL}/Products?$skiptoken=7`);
    expect(readNextLink(body, SERVICE_URL)).toBe('/Products?$skiptoken=7');
  });

  it('ignores next links inside entries', () => {
    const body = [
      '<feed xmlns="http://www.w3.org/2005/Atom">',
      '  <entry><link rel="next" href="Products?$skiptoken=9" /></entry>',
      '</feed>',
    ].join('\n');
    expect(readNextLink(body, SERVICE_URL)).toBeUndefined();
  });

  it('returns undefined for a single-entry document', () => {
    expect(readNextLink('<entry xmlns="http://www.w3.org/2005/Atom"></entry>', SERVICE_URL)).toBeUndefined();
  });

  it('throws on malformed XML', () => {
    expect(() => readNextLink('<feed><link rel="next"></feed>', SERVICE_URL)).toThrow();
  });
});
