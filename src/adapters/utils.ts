/**
 * Shared adapter utilities.
 */

/**
 * Month name → 1-indexed month number.
 * Used by: date patterns, listing parser
 */
export const MONTHS: Record<string, number> = {
  jan: 1, january: 1, feb: 2, february: 2, mar: 3, march: 3,
  apr: 4, april: 4, may: 5, jun: 6, june: 6, jul: 7, july: 7,
  aug: 8, august: 8, sep: 9, sept: 9, september: 9, oct: 10, october: 10,
  nov: 11, november: 11, dec: 12, december: 12,
};

const BLOCKED_HOSTNAMES = new Set(["localhost", "metadata.google.internal"]);

/** [first octet, second octet low, second octet high] */
const RESERVED_IPV4: ReadonlyArray<readonly [number, number, number]> = [
  [0, 0, 255],
  [10, 0, 255],
  [127, 0, 255],
  [169, 254, 254],
  [172, 16, 31],
  [192, 168, 168],
];

const IPV6_LOCAL_PREFIXES = ["fc", "fd", "fe80"];

/**
 * Octets of an IPv4 host, or of the address inside an IPv4-mapped IPv6 host.
 * The URL parser has already folded decimal, hex and octal forms into a dotted
 * quad and rewritten `::ffff:a.b.c.d` as two hex groups.
 */
function ipv4Octets(host: string): number[] | null {
  const dotted = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/.exec(host);
  if (dotted) return dotted.slice(1).map(Number);
  const mapped = /^::ffff:([0-9a-f]{1,4}):([0-9a-f]{1,4})$/.exec(host);
  if (!mapped) return null;
  const hi = parseInt(mapped[1], 16);
  const lo = parseInt(mapped[2], 16);
  return [hi >> 8, hi & 0xff, lo >> 8, lo & 0xff];
}

function isReservedHost(host: string): boolean {
  const octets = ipv4Octets(host);
  if (octets) {
    const [first, second] = octets;
    return RESERVED_IPV4.some(([a, lo, hi]) => first === a && second >= lo && second <= hi);
  }
  if (!host.includes(":")) return false;
  return host === "::" || host === "::1" || IPV6_LOCAL_PREFIXES.some((prefix) => host.startsWith(prefix));
}

/**
 * Throw unless the URL is safe to fetch from the server: http(s) only, and
 * never a loopback, private, link-local or metadata address.
 */
export function validateSourceUrl(url: string): void {
  const { protocol, hostname } = new URL(url);
  if (protocol !== "http:" && protocol !== "https:") {
    throw new Error("Blocked URL: non-HTTP protocol");
  }
  const host = hostname.toLowerCase().replace(/^\[(.*)\]$/, "$1");
  if (BLOCKED_HOSTNAMES.has(host)) {
    throw new Error("Blocked URL: internal hostname");
  }
  if (isReservedHost(host)) {
    throw new Error("Blocked URL: private/reserved IP");
  }
}

/**
 * Resolve a possibly relative link against the site origin and drop the fragment.
 * Returns null for empty or unparseable input.
 */
export function toAbsoluteUrl(href: string | null | undefined, baseUrl: string): string | null {
  const trimmed = href?.trim();
  if (!trimmed) return null;
  try {
    const url = new URL(trimmed, baseUrl);
    if (url.protocol !== "http:" && url.protocol !== "https:") return null;
    url.hash = "";
    return url.toString();
  } catch {
    return null;
  }
}

/**
 * Collapse runs of whitespace and trim. Empty results become null.
 */
export function cleanText(text: string | null | undefined): string | null {
  if (text == null) return null;
  const cleaned = text.replace(/\s+/g, " ").trim();
  return cleaned === "" ? null : cleaned;
}

const PLACEHOLDERS = new Set(["n/a", "na", "-", "--", "unknown", "tba"]);

/** Placeholder text shown for missing values ("N/A", "--") becomes null */
export function cleanPlaceholder(value: string | null): string | null {
  if (value == null) return null;
  const trimmed = value.trim();
  if (!trimmed || PLACEHOLDERS.has(trimmed.toLowerCase())) return null;
  return trimmed;
}
