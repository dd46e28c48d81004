/** `\` + 1-6 hex digits (one trailing whitespace swallowed), or `\` + a literal */
const CSS_UNICODE_ESCAPES = /\\([0-9a-fA-F]{1,6})\s?|\\([^\r\n\f0-9a-fA-F'"{};:()#*])/g;

const CSS_COMMENTS = /\/\*[\s\S]*?\*\//g;

/**
 * `expression`, including the fullwidth and small-capital look-alikes old
 * engines folded to ASCII.
 */
export const CSS_EXPRESSION =
  /[eE\uFF25\uFF45][xX\uFF38\uFF58][pP\uFF30\uFF50][rR\u0280\uFF32\uFF52][eE\uFF25\uFF45][sS\uFF33\uFF53]{2}[iI\u026A\uFF29\uFF49][oO\uFF2F\uFF4F][nN\u0274\uFF2E\uFF4E]/;

/**
 * `url(` reference: group 1 opening quote, group 2 target, group 3 closing
 * quote. The closing parenthesis is not consumed.
 */
export const CSS_URL = /[Uu][Rr\u0280][Ll\u029F]\s*\(\s*(['"]?)\s*([^'")\s]+)\s*(['"]?)\s*/g;

const REPLACEMENT_CHARACTER = "\uFFFD";

function fromHexEscape(hex: string): string {
  const codePoint = Number.parseInt(hex, 16);
  if (codePoint === 0 || codePoint > 0x10ffff || (codePoint >= 0xd800 && codePoint <= 0xdfff)) {
    return REPLACEMENT_CHARACTER;
  }
  return String.fromCodePoint(codePoint);
}

/**
 * Resolve CSS backslash escapes and strip comments, so policy checks see the
 * text a CSS engine would.
 *
 * An escaped backslash stays escaped (`\\` in, `\\` out).
 */
export function decodeCss(css: string): string {
  return css
    .replace(CSS_UNICODE_ESCAPES, (_match, hex: string | undefined, literal: string | undefined) => {
      if (hex !== undefined) return fromHexEscape(hex);
      return literal === "\\" ? "\\\\" : (literal ?? "");
    })
    .replace(CSS_COMMENTS, "");
}
