import { describe, expect, it } from 'vitest';

import { AdmissionFilter, evaluateAdmission, type AdmissionPolicy } from '../src/crawler/admission/admissionFilter.js';
import { compileBlockPatterns, findMatchingPattern } from '../src/crawler/admission/blockPatterns.js';
import { initializeStats } from '../src/crawler/state/stats.js';
import { canonicalHost, matchesAnyDomain, matchesDomain } from '../src/crawler/url/hostMatch.js';
import { isCrawlerError } from '../src/errors.js';

const policy: AdmissionPolicy = {
  allowedDomains: ['example.com'],
  blockedDomains: ['ads.example.com', 'facebook.com'],
  blockedUrlPatterns: compileBlockPatterns(['\\.pdf$', '[?&]utm_']),
};

describe('hostMatch', () => {
  it('canonicalizes case, trailing dots and www', () => {
    expect(canonicalHost('WWW.Example.COM.')).toBe('example.com');
  });

  it('matches the domain itself and its subdomains only', () => {
    expect(matchesDomain('sub.example.com', 'example.com')).toBe(true);
    expect(matchesDomain('example.com', 'example.com')).toBe(true);
    expect(matchesDomain('www.example.com', 'example.com')).toBe(true);
    expect(matchesDomain('notexample.com', 'example.com')).toBe(false);
    expect(matchesDomain('example.com.evil.com', 'example.com')).toBe(false);
  });

  it('never matches an empty domain', () => {
    expect(matchesDomain('example.com', '')).toBe(false);
    expect(matchesAnyDomain('example.com', [])).toBe(false);
  });
});

describe('blockPatterns', () => {
  it('compiles strings case-insensitively', () => {
    const [pattern] = compileBlockPatterns(['\\.PDF$']);
    expect(pattern?.test('https://example.com/file.pdf')).toBe(true);
  });

  it('strips stateful flags from RegExp inputs', () => {
    const [pattern] = compileBlockPatterns([/\/tag\//g]);
    expect(pattern?.flags).toBe('');
    expect(findMatchingPattern('https://example.com/tag/a', pattern ? [pattern] : [])).toBe(pattern);
    expect(findMatchingPattern('https://example.com/tag/b', pattern ? [pattern] : [])).toBe(pattern);
  });

  it('rejects invalid patterns with a configuration error', () => {
    let caught: unknown;
    try {
      compileBlockPatterns(['(unclosed']);
    } catch (error) {
      caught = error;
    }

    expect(isCrawlerError(caught) && caught.kind).toBe('config');
  });
});

describe('evaluateAdmission', () => {
  it('admits allowed http(s) URLs', () => {
    expect(evaluateAdmission('https://sub.example.com/page', policy)).toEqual({ allowed: true });
  });

  it('blocks non-http schemes first', () => {
    expect(evaluateAdmission('ftp://example.com/file', policy)).toEqual({
      allowed: false,
      reason: 'scheme',
      detail: 'ftp',
    });
    expect(evaluateAdmission('not a url', policy)).toEqual({
      allowed: false,
      reason: 'scheme',
      detail: 'unparsable',
    });
  });

  it('blocks hosts outside the allow-list', () => {
    expect(evaluateAdmission('https://evil.com/', policy)).toEqual({
      allowed: false,
      reason: 'not-allowed-domain',
      detail: 'evil.com',
    });
  });

  it('checks the allow-list before the block-list', () => {
    expect(evaluateAdmission('https://facebook.com/page', policy)).toMatchObject({
      reason: 'not-allowed-domain',
    });
    expect(evaluateAdmission('https://ads.example.com/banner', policy)).toEqual({
      allowed: false,
      reason: 'denied-domain',
      detail: 'ads.example.com',
    });
  });

  it('blocks URLs matching a pattern', () => {
    expect(evaluateAdmission('https://example.com/report.PDF', policy)).toEqual({
      allowed: false,
      reason: 'pattern',
      detail: '\\.pdf$',
    });
    expect(evaluateAdmission('https://example.com/?utm_source=mail', policy)).toMatchObject({
      reason: 'pattern',
    });
  });

  it('gives the same answer every time', () => {
    const first = evaluateAdmission('https://example.com/a.pdf', policy);
    const second = evaluateAdmission('https://example.com/a.pdf', policy);
    expect(second).toEqual(first);
  });
});

describe('AdmissionFilter', () => {
  it('counts blocked URLs by reason', () => {
    const stats = initializeStats();
    const filter = new AdmissionFilter(policy, stats);

    filter.admit('https://example.com/');
    filter.admit('https://evil.com/');
    filter.admit('https://example.com/a.pdf');
    filter.admit('https://example.com/b.pdf');

    expect(stats.pagesBlocked).toBe(3);
    expect(Object.fromEntries(stats.blockReasons)).toEqual({ 'not-allowed-domain': 1, pattern: 2 });
  });
});
