import { isIP } from 'net';

/**
 * Decide whether a browser Origin belongs to this machine or the local network.
 *
 * Allowed hosts: localhost, loopback, RFC1918 IPv4 ranges, and IPv6 unique-local
 * (fc00::/7), link-local (fe80::/10) and site-local (fec0::/10) addresses.
 * Only http and https origins qualify.
 */
export function isLocalNetworkOrigin(origin: string): boolean {
  let url: URL;
  try {
    url = new URL(origin);
  } catch {
    return false;
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    return false;
  }

  // URL keeps IPv6 hosts bracketed
  const host = url.hostname.replace(/^\[/, '').replace(/\]$/, '').toLowerCase();
  if (host === 'localhost') {
    return true;
  }

  switch (isIP(host)) {
    case 4:
      return isPrivateIPv4(host);
    case 6:
      return isPrivateIPv6(host);
    default:
      return false;
  }
}

function isPrivateIPv4(address: string): boolean {
  const [a, b] = address.split('.').map(part => parseInt(part, 10));
  if (a === 127) return true;
  if (a === 10) return true;
  if (a === 172 && b >= 16 && b <= 31) return true;
  return a === 192 && b === 168;
}

function isPrivateIPv6(address: string): boolean {
  if (address === '::1') {
    return true;
  }

  // IPv4-mapped (::ffff:a.b.c.d), which URL normalizes to hex groups
  const mapped = address.match(/^::ffff:([0-9a-f]{1,4}):([0-9a-f]{1,4})$/);
  if (mapped) {
    const high = parseInt(mapped[1], 16);
    const low = parseInt(mapped[2], 16);
    return isPrivateIPv4(`${high >> 8}.${high & 0xff}.${low >> 8}.${low & 0xff}`);
  }

  const firstGroup = address.startsWith('::') ? 0 : parseInt(address.split(':')[0], 16);
  if (Number.isNaN(firstGroup)) {
    return false;
  }

  const isUniqueLocal = (firstGroup & 0xfe00) === 0xfc00;
  const isLinkLocal = (firstGroup & 0xffc0) === 0xfe80;
  const isSiteLocal = (firstGroup & 0xffc0) === 0xfec0;
  return isUniqueLocal || isLinkLocal || isSiteLocal;
}
