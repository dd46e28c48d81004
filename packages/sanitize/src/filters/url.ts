import type { SanitizeContext } from "./context.js";

/**
 * Scheme before a literal `:` or an entity-encoded one (`&#58;`, `&#x3a;`),
 * so encoded delimiters cannot hide a scheme.
 */
const SCHEME_PATTERN = /^\s*([^/#]*?)(?::|&#0*58|&#x0*3a)/i;

export interface SafeUrl {
  readonly value: string;
  /** The scheme, when the value carries one */
  readonly scheme: string | undefined;
}

/**
 * Accept `url` if it has no scheme or an allowed one.
 * Returns undefined for a disallowed scheme.
 */
export function getSafeUrl(url: string, allowedSchemes: ReadonlySet<string>): SafeUrl | undefined {
  const match = SCHEME_PATTERN.exec(url);
  if (match === null) {
    return { value: url, scheme: undefined };
  }
  const scheme = match[1] ?? "";
  return allowedSchemes.has(scheme) ? { value: url, scheme } : undefined;
}

function resolveUrl(url: string, baseUrl: string): string | undefined {
  try {
    return new URL(url, baseUrl).href;
  } catch {
    return undefined;
  }
}

/**
 * Sanitize one URL found on `element`: scheme allow-list, then relative
 * resolution against the call's base URL, then the `FilterUrl` hook.
 *
 * @returns the value to write back, or undefined to reject it
 */
export function sanitizeUrl(ctx: SanitizeContext, element: Element, url: string): string | undefined {
  const safe = getSafeUrl(url, ctx.policy.allowedSchemes);

  let candidate = safe?.value;
  if (safe !== undefined && safe.scheme === undefined && ctx.baseUrl !== "") {
    candidate = resolveUrl(safe.value, ctx.baseUrl);
  }

  const result = ctx.hooks.emit("FilterUrl", {
    tag: element,
    originalUrl: url,
    sanitizedUrl: candidate,
  });
  if (result.action === "block") return undefined;
  if (result.action === "modify") return result.data.sanitizedUrl;
  return candidate;
}
