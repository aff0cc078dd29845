const DOMAIN_PATTERN = /^(?:[a-z0-9](?:[a-z0-9-]*[a-z0-9])?\.)+[a-z0-9](?:[a-z0-9-]*[a-z0-9])?$/;

/**
 * Lowercase a domain given on the command line, dropping a leading '@' or '.'
 */
export function normalizeDomain(domain: string): string {
  return domain.trim().toLowerCase().replace(/^[@.]+/, '');
}

export function isValidDomain(domain: string): boolean {
  return DOMAIN_PATTERN.test(domain);
}

/**
 * Domain part of an email address, lowercased. null when the address has none.
 */
export function emailDomain(email: string): string | null {
  const at = email.lastIndexOf('@');
  if (at < 0) {
    return null;
  }
  const domain = normalizeDomain(email.slice(at + 1));
  return domain.length > 0 ? domain : null;
}
