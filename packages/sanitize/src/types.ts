/** Why a node, attribute, declaration or class is being removed */
export type RemoveReason =
  | "not-allowed-tag"
  | "not-allowed-attribute"
  | "not-allowed-url-value"
  | "not-allowed-value"
  | "not-allowed-style"
  | "not-allowed-css-class"
  | "class-attribute-empty"
  | "style-attribute-empty";

/**
 * Rule categories a stylesheet can contain. Vendor-prefixed at-rules are
 * classified by their unprefixed name.
 */
export type CssRuleType =
  | "style"
  | "charset"
  | "import"
  | "media"
  | "font-face"
  | "page"
  | "keyframes"
  | "keyframe"
  | "margin"
  | "namespace"
  | "counter-style"
  | "supports"
  | "document"
  | "font-feature-values"
  | "viewport"
  | "layer"
  | "container"
  | "unknown";

/** What a logged removal refers to */
export type RemovalSubject = "tag" | "attribute" | "style" | "at-rule" | "comment" | "css-class";

/** One decision applied during a sanitize call */
export interface SanitizeRemoval {
  readonly subject: RemovalSubject;
  /** Tag name of the element the decision concerns (lowercase) */
  readonly tag: string | undefined;
  /** Attribute name, property name, class token, rule text or comment data */
  readonly name: string;
  readonly reason: RemoveReason | undefined;
}

/** Result of {@link MarkupSanitizer.sanitizeWithReport}: immutable */
export interface SanitizeReport {
  readonly original: string;
  readonly clean: string;
  readonly removals: readonly SanitizeRemoval[];
  readonly safe: boolean;
}
