/**
 * Bucket name rules for DNS (virtual-hosted) addressing
 */

const SUBDOMAIN_CHARS = /^[a-z0-9.-]+$/;
const DOTTED_QUAD = /^\d+\.\d+\.\d+\.\d+$/;

/**
 * Whether a bucket name can be used as a DNS label in front of the endpoint
 * host. Stricter than general DNS: lowercase only, 3 to 63 characters, no
 * leading or trailing '-' or '.', no '..', '.-' or '-.', and not shaped
 * like an IPv4 address.
 */
export function isValidBucketSubdomain(name: string): boolean {
  if (name.length < 3 || name.length > 63) {
    return false;
  }

  if (!SUBDOMAIN_CHARS.test(name)) {
    return false;
  }

  const first = name[0];
  const last = name[name.length - 1];
  if (first === '-' || first === '.' || last === '-' || last === '.') {
    return false;
  }

  if (name.includes('..') || name.includes('.-') || name.includes('-.')) {
    return false;
  }

  return !DOTTED_QUAD.test(name);
}
