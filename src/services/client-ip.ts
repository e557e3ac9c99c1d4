import { IncomingHttpHeaders } from "http";
import { Address } from "./address";
import { HostClassifier } from "./host-classifier";
import { isReserved } from "./reserved-ranges";

// Single-value headers set by CDNs and reverse proxies, checked in order
const CLIENT_IP_HEADERS = [
  "cf-connecting-ip", // Cloudflare
  "fastly-client-ip", // Fastly
  "x-azure-clientip", // Azure Front Door
  "x-akamai-client-ip", // Akamai
  "true-client-ip", // Akamai, Cloudflare Enterprise
  "x-cdn-src-ip",
  "x-real-ip",
];

function headerValue(headers: IncomingHttpHeaders, name: string): string | null {
  const value = headers[name];
  if (Array.isArray(value)) return value[0] ?? null;
  return value ?? null;
}

/**
 * Public address from a header value, ignoring private and reserved ones
 * which only describe the proxy's own network
 */
function publicAddress(text: string | null): Address | null {
  if (!text) return null;
  const address = HostClassifier.parseIpLiteral(text.trim());
  return address && !isReserved(address) ? address : null;
}

/**
 * Extract the `for=` node of the first element of an RFC 7239 Forwarded
 * header, e.g. `for="[2001:db8::1]:4711";proto=https`
 */
export function parseForwardedFor(value: string): string | null {
  const firstElement = value.split(",")[0];
  for (const pair of firstElement.split(";")) {
    const [key, ...rest] = pair.trim().split("=");
    if (key.toLowerCase() !== "for" || rest.length === 0) continue;

    let node = rest.join("=").trim().replace(/^"|"$/g, "");
    if (node.startsWith("[")) {
      const end = node.indexOf("]");
      return end === -1 ? null : node.slice(0, end + 1);
    }
    // IPv4 with a port
    if (/^[\d.]+:\d+$/.test(node)) {
      node = node.slice(0, node.indexOf(":"));
    }
    return node;
  }
  return null;
}

/**
 * The requesting client's address: the first public address from the
 * known proxy headers when they are trusted, else the socket peer.
 */
export function clientAddress(
  headers: IncomingHttpHeaders,
  remoteAddress: string | undefined,
  trustProxyHeaders: boolean
): Address | null {
  if (trustProxyHeaders) {
    for (const name of CLIENT_IP_HEADERS) {
      const address = publicAddress(headerValue(headers, name));
      if (address) return address;
    }

    const forwardedFor = headerValue(headers, "x-forwarded-for");
    const forwardedForAddress = publicAddress(
      forwardedFor ? forwardedFor.split(",")[0] : null
    );
    if (forwardedForAddress) return forwardedForAddress;

    const forwarded = headerValue(headers, "forwarded");
    const forwardedAddress = publicAddress(
      forwarded ? parseForwardedFor(forwarded) : null
    );
    if (forwardedAddress) return forwardedAddress;
  }

  return remoteAddress ? HostClassifier.parseIpLiteral(remoteAddress) : null;
}
