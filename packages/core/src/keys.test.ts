import { describe, expect, it } from 'vitest';

import { InvalidArtifactUrlError } from './errors.js';
import {
  artifactKey,
  artifactPath,
  buildUrlPattern,
  domainToKey,
  extractDomain,
  matchesUrlPattern,
  metadataPath
} from './keys.js';

describe('extractDomain', () => {
  it('returns the lowercase host including any port', () => {
    expect(extractDomain('https://News.Example.org/a/b?c=1')).toBe('news.example.org');
    expect(extractDomain('http://localhost:8080/feed')).toBe('localhost:8080');
  });

  it('rejects values that are not absolute URLs', () => {
    expect(() => extractDomain('example.org/a')).toThrow(InvalidArtifactUrlError);
    expect(() => extractDomain('mailto:someone@example.org')).toThrow(/has no host/);
  });
});

describe('artifact keys', () => {
  it('replaces characters outside the safe set', () => {
    expect(domainToKey('hms.harvard.edu')).toBe('hms_harvard_edu');
    expect(domainToKey('Localhost:8080')).toBe('localhost_8080');
    expect(domainToKey('my-site.example.org')).toBe('my-site_example_org');
  });

  it('suffixes list and content scrapers', () => {
    expect(artifactKey('example.org')).toBe('example_org');
    expect(artifactKey('example.org', 'list')).toBe('example_org_list');
    expect(artifactKey('example.org', 'content')).toBe('example_org_content');
    expect(artifactKey('example.org_list')).toBe('example_org_list');
  });

  it('maps keys to logical storage paths', () => {
    expect(artifactPath('example_org_list')).toBe('scrapers/example_org_list.js');
    expect(metadataPath('example_org_list')).toBe('metadata/example_org_list.json');
  });
});

describe('url patterns', () => {
  const pattern = buildUrlPattern('example.org');

  it('escapes the host', () => {
    expect(pattern).toBe('https?://example\\.org(?:[/?#]|$)');
  });

  it('matches any path under the host over http or https', () => {
    expect(matchesUrlPattern(pattern, 'https://example.org/a')).toBe(true);
    expect(matchesUrlPattern(pattern, 'http://example.org/news/2024?page=2')).toBe(true);
    expect(matchesUrlPattern(pattern, 'https://example.org')).toBe(true);
  });

  it('anchors the match at the start of the URL and at the end of the host', () => {
    expect(matchesUrlPattern(pattern, 'https://exampleXorg/a')).toBe(false);
    expect(matchesUrlPattern(pattern, 'https://example.org.evil.test/a')).toBe(false);
    expect(matchesUrlPattern(pattern, 'see https://example.org/a')).toBe(false);
  });

  it('treats a pattern as a prefix of the URL', () => {
    expect(matchesUrlPattern('https?://example\\.com/shop/', 'https://example.com/shop/42')).toBe(true);
    expect(matchesUrlPattern('https?://example\\.com/shop/', 'https://example.com/blog/42')).toBe(false);
  });

  it('never matches with an empty or invalid pattern', () => {
    expect(matchesUrlPattern('', 'https://example.org/a')).toBe(false);
    expect(matchesUrlPattern('https?://(unclosed', 'https://example.org/a')).toBe(false);
  });
});
