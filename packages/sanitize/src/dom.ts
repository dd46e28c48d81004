/**
 * DOM plumbing over jsdom: node guards, traversal, and the replaceable
 * parser/formatter pair the sanitizer reads and writes markup with.
 *
 * jsdom does not install `Node`/`Element` globals, so nodes are told apart by
 * `nodeType` rather than `instanceof`.
 */

import { type DOMWindow, JSDOM } from "jsdom";

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;
const CDATA_SECTION_NODE = 4;
const PROCESSING_INSTRUCTION_NODE = 7;
const COMMENT_NODE = 8;
const DOCUMENT_NODE = 9;
const DOCUMENT_TYPE_NODE = 10;

/** A node the sanitizer can be scoped to */
export type SanitizeRoot = Document | Element | DocumentFragment;

// ---------------------------------------------------------------------------
// Guards
// ---------------------------------------------------------------------------

export function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

export function isComment(node: Node): node is Comment {
  return node.nodeType === COMMENT_NODE;
}

export function isText(node: Node): node is Text {
  return node.nodeType === TEXT_NODE;
}

export function isDocument(node: Node): node is Document {
  return node.nodeType === DOCUMENT_NODE;
}

export function isDocumentType(node: Node): node is DocumentType {
  return node.nodeType === DOCUMENT_TYPE_NODE;
}

/** Nodes that can be replaced in place by their parent */
export function isChildNode(node: Node): node is ChildNode {
  switch (node.nodeType) {
    case ELEMENT_NODE:
    case TEXT_NODE:
    case CDATA_SECTION_NODE:
    case PROCESSING_INSTRUCTION_NODE:
    case COMMENT_NODE:
    case DOCUMENT_TYPE_NODE:
      return true;
    default:
      return false;
  }
}

/** Lowercase tag name, as used in hook payloads and reports */
export function tagNameOf(element: Element): string {
  return element.tagName.toLowerCase();
}

// ---------------------------------------------------------------------------
// Traversal
// ---------------------------------------------------------------------------

/**
 * All descendants of `root` in document order, `root` excluded.
 * Returned as a snapshot so callers may detach nodes while iterating.
 */
export function getAllNodes(root: Node): Node[] {
  const nodes: Node[] = [];
  const visit = (parent: Node): void => {
    for (const child of Array.from(parent.childNodes)) {
      nodes.push(child);
      visit(child);
    }
  };
  visit(root);
  return nodes;
}

// ---------------------------------------------------------------------------
// Shared window
// ---------------------------------------------------------------------------

let sharedWindow: DOMWindow | undefined;

/** Lazily created window that owns every document parsed by this package */
export function getWindow(): DOMWindow {
  if (sharedWindow === undefined) {
    sharedWindow = new JSDOM("").window;
  }
  return sharedWindow;
}

// ---------------------------------------------------------------------------
// Parsers
// ---------------------------------------------------------------------------

export interface ParsedFragment {
  readonly document: Document;
  /** The node whose children are the parsed fragment */
  readonly context: SanitizeRoot;
}

export interface MarkupParser {
  /** Parse a complete document */
  parseDocument(markup: string): Document;
  /** Parse a fragment; the sanitizer is scoped to `context` */
  parseFragment(markup: string): ParsedFragment;
}

export type XmlContentType =
  | "application/xml"
  | "text/xml"
  | "image/svg+xml"
  | "application/xhtml+xml";

/**
 * HTML5 parser. Fragments are parsed as the body of an otherwise empty
 * document, so the tree builder applies the same rules a browser would.
 */
export function createHtmlParser(): MarkupParser {
  const parse = (markup: string): Document =>
    new (getWindow().DOMParser)().parseFromString(markup, "text/html");

  return {
    parseDocument: parse,
    parseFragment(markup) {
      const document = parse(`<!doctype html><html><body>${markup}`);
      return { document, context: document.body };
    },
  };
}

/**
 * XML parser for the given content type. A fragment is parsed as a whole
 * document, so it must have a single root element. Malformed input yields the
 * parser's `parsererror` document, which the tag allow-list then strips.
 */
export function createXmlParser(contentType: XmlContentType = "application/xml"): MarkupParser {
  const parse = (markup: string): Document =>
    new (getWindow().DOMParser)().parseFromString(markup, contentType);

  return {
    parseDocument: parse,
    parseFragment(markup) {
      const document = parse(markup);
      return { document, context: document };
    },
  };
}

// ---------------------------------------------------------------------------
// Formatters
// ---------------------------------------------------------------------------

export interface MarkupFormatter {
  /** Serialize the children of `node` (the sanitized fragment) */
  serializeChildren(node: SanitizeRoot): string;
  /** Serialize a whole document */
  serializeDocument(document: Document): string;
}

function escapeText(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/\u00a0/g, "&nbsp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

function serializeDoctype(doctype: DocumentType): string {
  const { name, publicId, systemId } = doctype;
  if (publicId !== "") {
    return `<!DOCTYPE ${name} PUBLIC "${publicId}"${systemId === "" ? "" : ` "${systemId}"`}>`;
  }
  if (systemId !== "") return `<!DOCTYPE ${name} SYSTEM "${systemId}">`;
  return `<!DOCTYPE ${name}>`;
}

function serializeHtmlNode(node: Node): string {
  if (isElement(node)) return node.outerHTML;
  if (isText(node)) return escapeText(node.data);
  if (isComment(node)) return `<!--${node.data}-->`;
  if (isDocumentType(node)) return serializeDoctype(node);
  return "";
}

/** HTML serialization, as `innerHTML` / `outerHTML` produce it */
export const htmlFormatter: MarkupFormatter = {
  serializeChildren(node) {
    if (isElement(node)) return node.innerHTML;
    return Array.from(node.childNodes, serializeHtmlNode).join("");
  },
  serializeDocument(document) {
    return Array.from(document.childNodes, serializeHtmlNode).join("");
  },
};

/** XML serialization through `XMLSerializer` */
export const xmlFormatter: MarkupFormatter = {
  serializeChildren(node) {
    const serializer = new (getWindow().XMLSerializer)();
    return Array.from(node.childNodes, (child) => serializer.serializeToString(child)).join("");
  },
  serializeDocument(document) {
    return new (getWindow().XMLSerializer)().serializeToString(document);
  },
};
