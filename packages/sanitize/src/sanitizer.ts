import { SanitizeContentBlockedError, wrapError } from "@sanitas/errors";
import type { HookRegistryConfig } from "@sanitas/hooks";
import { NameSet, parseSanitizerOptions, type SanitizerOptions } from "./config.js";
import {
  DEFAULT_ALLOWED_AT_RULES,
  DEFAULT_ALLOWED_ATTRIBUTES,
  DEFAULT_ALLOWED_CLASSES,
  DEFAULT_ALLOWED_CSS_PROPERTIES,
  DEFAULT_ALLOWED_SCHEMES,
  DEFAULT_ALLOWED_TAGS,
  DEFAULT_DISALLOWED_CSS_PROPERTY_VALUE,
  DEFAULT_URI_ATTRIBUTES,
} from "./constants.js";
import {
  createHtmlParser,
  htmlFormatter,
  type MarkupFormatter,
  type MarkupParser,
  type SanitizeRoot,
} from "./dom.js";
import {
  postProcess,
  removeComments,
  removeDisallowedTags,
  type SanitizeContext,
  type SanitizerPolicy,
  sanitizeElement,
  sanitizeStyleSheets,
} from "./filters/index.js";
import { createSanitizerHooks, type SanitizerHooks } from "./hooks.js";
import { recordDuration, recordRemoval, type SanitizeMode } from "./metrics.js";
import type { CssRuleType, SanitizeRemoval, SanitizeReport } from "./types.js";

export interface MarkupSanitizerOptions extends SanitizerOptions {
  /** Defaults to the HTML5 parser */
  readonly parser?: MarkupParser;
  /** Defaults to HTML serialization */
  readonly formatter?: MarkupFormatter;
  readonly hooks?: HookRegistryConfig;
}

/**
 * Allow-list sanitizer for HTML and XML markup with inline and embedded CSS.
 *
 * The allow-lists are public and may be edited between calls; each instance
 * starts from its own copy of the defaults. Decisions can be vetoed or
 * rewritten through {@link MarkupSanitizer.hooks}. Hook errors surface as
 * they are; any other failure inside a pass is wrapped in an `InternalError`.
 *
 * @example
 * ```ts
 * const sanitizer = new MarkupSanitizer();
 * sanitizer.hooks.intercept("RemovingTag", ({ tag }) =>
 *   tag.tagName === "title" ? { action: "block", reason: "keep titles" } : { action: "continue" },
 * );
 * sanitizer.sanitize('<svg><script>alert(1)</script><title>Chart</title></svg>');
 * // => '<svg><title>Chart</title></svg>'
 * ```
 */
export class MarkupSanitizer implements SanitizerPolicy {
  readonly allowedTags: NameSet;
  readonly allowedAttributes: NameSet;
  readonly uriAttributes: NameSet;
  readonly allowedCssProperties: NameSet;
  readonly allowedSchemes: NameSet;
  /** Empty means every class is allowed */
  readonly allowedClasses: NameSet;
  readonly allowedAtRules: Set<CssRuleType>;

  allowDataAttributes: boolean;
  /** Splice the children of a removed element into its place instead of dropping them */
  keepChildNodes: boolean;
  disallowCssPropertyValue: RegExp;
  /** Longest markup accepted; undefined for no limit */
  maxInputLength: number | undefined;

  parser: MarkupParser;
  formatter: MarkupFormatter;

  readonly hooks: SanitizerHooks;

  /**
   * @throws SanitizeConfigurationError when the options fail validation
   */
  constructor(options: MarkupSanitizerOptions = {}) {
    const config = parseSanitizerOptions(options);

    this.allowedTags = new NameSet(config.allowedTags ?? DEFAULT_ALLOWED_TAGS);
    this.allowedAttributes = new NameSet(config.allowedAttributes ?? DEFAULT_ALLOWED_ATTRIBUTES);
    this.uriAttributes = new NameSet(config.uriAttributes ?? DEFAULT_URI_ATTRIBUTES);
    this.allowedCssProperties = new NameSet(
      config.allowedCssProperties ?? DEFAULT_ALLOWED_CSS_PROPERTIES,
    );
    this.allowedSchemes = new NameSet(config.allowedSchemes ?? DEFAULT_ALLOWED_SCHEMES);
    this.allowedClasses = new NameSet(config.allowedClasses ?? DEFAULT_ALLOWED_CLASSES);
    this.allowedAtRules = new Set<CssRuleType>(config.allowedAtRules ?? DEFAULT_ALLOWED_AT_RULES);

    this.allowDataAttributes = config.allowDataAttributes ?? false;
    this.keepChildNodes = config.keepChildNodes ?? false;
    this.disallowCssPropertyValue =
      config.disallowCssPropertyValue ?? DEFAULT_DISALLOWED_CSS_PROPERTY_VALUE;
    this.maxInputLength = config.maxInputLength;

    this.parser = options.parser ?? createHtmlParser();
    this.formatter = options.formatter ?? htmlFormatter;
    this.hooks = createSanitizerHooks(options.hooks);
  }

  /**
   * Sanitize a fragment and serialize what remains (for HTML, the children
   * of the body it was parsed into).
   *
   * @param baseUrl - relative URLs are resolved against it when non-empty
   * @throws SanitizeContentBlockedError when `maxInputLength` is exceeded
   */
  sanitize(markup: string, baseUrl = "", formatter: MarkupFormatter = this.formatter): string {
    this.checkLength(markup);
    const { document, context } = this.parser.parseFragment(markup);
    this.run("fragment", baseUrl, undefined, (ctx) => this.sanitizeTree(ctx, document, context));
    return formatter.serializeChildren(context);
  }

  /** Parse a fragment and return the sanitized document */
  sanitizeDom(markup: string, baseUrl?: string): Document;
  /** Sanitize an existing document in place, scoped to `context` (default: the whole document) */
  sanitizeDom(document: Document, context?: SanitizeRoot, baseUrl?: string): Document;
  sanitizeDom(
    input: string | Document,
    contextOrBaseUrl?: SanitizeRoot | string,
    baseUrl = "",
  ): Document {
    if (typeof input === "string") {
      this.checkLength(input);
      const { document, context } = this.parser.parseFragment(input);
      const base = typeof contextOrBaseUrl === "string" ? contextOrBaseUrl : "";
      this.run("dom", base, undefined, (ctx) => this.sanitizeTree(ctx, document, context));
      return document;
    }

    const context = typeof contextOrBaseUrl === "object" ? contextOrBaseUrl : input;
    this.run("dom", baseUrl, undefined, (ctx) => this.sanitizeTree(ctx, input, context));
    return input;
  }

  /**
   * Sanitize a complete document. The structural `html`, `head` and `body`
   * tags are subject to the allow-list like any other.
   */
  sanitizeDocument(
    markup: string,
    baseUrl = "",
    formatter: MarkupFormatter = this.formatter,
  ): string {
    this.checkLength(markup);
    const document = this.parser.parseDocument(markup);
    this.run("document", baseUrl, undefined, (ctx) => this.sanitizeTree(ctx, document, document));
    return formatter.serializeDocument(document);
  }

  /** Like {@link sanitize}, also listing every decision that was applied */
  sanitizeWithReport(markup: string, baseUrl = ""): SanitizeReport {
    this.checkLength(markup);
    const removals: SanitizeRemoval[] = [];
    const { document, context } = this.parser.parseFragment(markup);
    this.run("fragment", baseUrl, removals, (ctx) => this.sanitizeTree(ctx, document, context));

    return Object.freeze({
      original: markup,
      clean: this.formatter.serializeChildren(context),
      removals: Object.freeze(removals),
      safe: removals.length === 0,
    });
  }

  private checkLength(markup: string): void {
    if (this.maxInputLength !== undefined && markup.length > this.maxInputLength) {
      throw new SanitizeContentBlockedError(
        "Markup exceeds maximum input length",
        markup.length,
        this.maxInputLength,
      );
    }
  }

  private run(
    mode: SanitizeMode,
    baseUrl: string,
    removals: SanitizeRemoval[] | undefined,
    work: (ctx: SanitizeContext) => void,
  ): void {
    const ctx: SanitizeContext = {
      policy: this,
      hooks: this.hooks,
      baseUrl,
      record: (removal) => {
        removals?.push(removal);
        recordRemoval(removal);
      },
    };

    const start = performance.now();
    try {
      work(ctx);
    } catch (error) {
      throw wrapError(error);
    } finally {
      recordDuration(mode, performance.now() - start);
    }
  }

  private sanitizeTree(ctx: SanitizeContext, document: Document, context: SanitizeRoot): void {
    removeDisallowedTags(ctx, context);
    sanitizeStyleSheets(ctx, document);

    for (const element of Array.from(context.querySelectorAll("*"))) {
      sanitizeElement(ctx, element);
    }

    removeComments(ctx, context);
    postProcess(ctx, document, context);
  }
}
