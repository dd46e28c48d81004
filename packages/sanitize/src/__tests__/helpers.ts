import { MarkupSanitizer, type MarkupSanitizerOptions } from "../sanitizer.js";

/** Tags used by most HTML tests; the defaults only cover SVG */
export const HTML_TAGS = ["div", "span", "p", "a", "b", "style"] as const;

export function makeSanitizer(options: MarkupSanitizerOptions = {}): MarkupSanitizer {
  return new MarkupSanitizer({ allowedTags: [...HTML_TAGS], ...options });
}

export const END_TO_END_SVG =
  '<svg><script>alert(1)</script><circle cx="1" style="fill:url(javascript:alert(1))"></circle></svg>';
