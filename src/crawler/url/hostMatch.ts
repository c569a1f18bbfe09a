export function canonicalHost(hostname: string): string {
  const lowered = hostname.trim().toLowerCase().replace(/\.$/, '');
  return lowered.startsWith('www.') ? lowered.slice(4) : lowered;
}

/** True when `hostname` is `domain` itself or one of its subdomains. */
export function matchesDomain(hostname: string, domain: string): boolean {
  const host = canonicalHost(hostname);
  const target = canonicalHost(domain);
  if (!target) {
    return false;
  }
  return host === target || host.endsWith(`.${target}`);
}

export function matchesAnyDomain(hostname: string, domains: readonly string[]): boolean {
  return domains.some((domain) => matchesDomain(hostname, domain));
}
