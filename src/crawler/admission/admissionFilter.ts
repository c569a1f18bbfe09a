import type { AdmissionDecision } from '../../types.js';
import { matchesAnyDomain } from '../url/hostMatch.js';
import { type CrawlStats, recordBlocked } from '../state/stats.js';
import { findMatchingPattern } from './blockPatterns.js';

export interface AdmissionPolicy {
  allowedDomains: readonly string[];
  blockedDomains: readonly string[];
  blockedUrlPatterns: readonly RegExp[];
}

const ALLOWED: AdmissionDecision = { allowed: true };

/**
 * Decides whether a normalized URL may be fetched. The first failing check
 * wins: scheme, allow-list, block-list, then URL patterns.
 */
export function evaluateAdmission(url: string, policy: AdmissionPolicy): AdmissionDecision {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return { allowed: false, reason: 'scheme', detail: 'unparsable' };
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    return { allowed: false, reason: 'scheme', detail: parsed.protocol.replace(/:$/, '') };
  }

  if (!matchesAnyDomain(parsed.hostname, policy.allowedDomains)) {
    return { allowed: false, reason: 'not-allowed-domain', detail: parsed.hostname };
  }

  if (matchesAnyDomain(parsed.hostname, policy.blockedDomains)) {
    return { allowed: false, reason: 'denied-domain', detail: parsed.hostname };
  }

  const pattern = findMatchingPattern(url, policy.blockedUrlPatterns);
  if (pattern) {
    return { allowed: false, reason: 'pattern', detail: pattern.source };
  }

  return ALLOWED;
}

export class AdmissionFilter {
  constructor(
    private readonly policy: AdmissionPolicy,
    private readonly stats: CrawlStats,
  ) {}

  /** Same decision as evaluateAdmission; a block also bumps the blocked counter. */
  admit(url: string): AdmissionDecision {
    const decision = evaluateAdmission(url, this.policy);
    if (!decision.allowed) {
      recordBlocked(this.stats, decision.reason);
    }
    return decision;
  }
}
