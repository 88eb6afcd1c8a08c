/**
 * PubMed efetch XML document model.
 *
 * Parses a `PubmedArticleSet` payload with fast-xml-parser using
 * `preserveOrder: true`, so inline markup inside titles keeps its position,
 * and resolves slash-separated element paths against the resulting tree.
 */

import { XMLParser, XMLValidator } from "fast-xml-parser";
import { MalformedDocumentError } from "../errors.js";

/**
 * A node in the preserveOrder output.
 * Either a text node `{ "#text": string }` or an element node
 * `{ tagName: OrderedNode[], ":@"?: { "@_attr": value } }`.
 */
export type OrderedNode = Record<string, unknown>;

/** A parsed PubMed efetch document. */
export interface PubmedDocument {
  readonly root: OrderedNode[];
}

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  textNodeName: "#text",
  trimValues: false,
  // Keep "0120" and "2010" as written; numeric conversion belongs to the serializer.
  parseTagValue: false,
  preserveOrder: true,
  processEntities: true,
  htmlEntities: true,
});

// ─── Navigation Helpers ──────────────────────────────────────────────

function isOrderedNode(value: unknown): value is OrderedNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toNodeList(value: unknown): OrderedNode[] {
  return Array.isArray(value) ? value.filter(isOrderedNode) : [];
}

/** Get the tag name of an ordered node (the first key that isn't ":@" or "#text"). */
function getTagName(node: OrderedNode): string | undefined {
  for (const key of Object.keys(node)) {
    if (key !== ":@" && key !== "#text") return key;
  }
  return undefined;
}

/** Get the children array of an element node. */
function getChildren(node: OrderedNode): OrderedNode[] {
  const tag = getTagName(node);
  if (!tag) return [];
  return toNodeList(node[tag]);
}

/** Get an attribute of an element node. */
export function nodeAttr(node: OrderedNode, attrName: string): string | undefined {
  const attrs = node[":@"];
  if (!isOrderedNode(attrs)) return undefined;
  const val = attrs[`@_${attrName}`];
  return val != null ? String(val) : undefined;
}

/**
 * Extract plain text from a node that may contain nested elements,
 * e.g. `Role of <i>E. coli</i> in sepsis` → `Role of E. coli in sepsis`.
 */
export function nodeText(node: OrderedNode): string {
  if ("#text" in node) {
    const val = node["#text"];
    return val != null ? String(val) : "";
  }
  return getChildren(node).map(nodeText).join("");
}

// ─── Path Lookup ─────────────────────────────────────────────────────

interface PathStep {
  tag: string;
  attr?: { name: string; value: string };
}

const STEP_PATTERN = /^([^[\]@"\/]+)(?:\[@([\w:-]+)="([^"]*)"\])?$/;

function parsePath(path: string): PathStep[] {
  return path.split("/").map((segment) => {
    const match = STEP_PATTERN.exec(segment);
    const tag = match?.[1];
    if (!match || !tag) {
      throw new Error(`Invalid path segment "${segment}" in ${path}`);
    }
    const [, , attrName, attrValue] = match;
    if (attrName !== undefined && attrValue !== undefined) {
      return { tag, attr: { name: attrName, value: attrValue } };
    }
    return { tag };
  });
}

function matchesStep(node: OrderedNode, step: PathStep): boolean {
  if (!(step.tag in node)) return false;
  if (!step.attr) return true;
  return nodeAttr(node, step.attr.name) === step.attr.value;
}

function walk(start: OrderedNode[], steps: PathStep[]): OrderedNode[] {
  let candidates = start;
  let matches: OrderedNode[] = [];
  for (const [index, step] of steps.entries()) {
    matches = candidates.filter((node) => matchesStep(node, step));
    if (index < steps.length - 1) candidates = matches.flatMap(getChildren);
  }
  return matches;
}

/**
 * Resolve a path like `PubmedArticleSet/PubmedArticle/MedlineCitation`
 * from the document root. Every step keeps all matching siblings.
 * A step may filter on one attribute: `ArticleId[@IdType="doi"]`.
 */
export function selectNodes(document: PubmedDocument, path: string): OrderedNode[] {
  return walk(document.root, parsePath(path));
}

/** Resolve a path relative to an element node's children. */
export function selectChildNodes(node: OrderedNode, path: string): OrderedNode[] {
  return walk(getChildren(node), parsePath(path));
}

/** Text of every node matching `path` below `node`. */
export function selectText(node: OrderedNode, path: string): string[] {
  return selectChildNodes(node, path).map(nodeText);
}

// ─── Parsing ─────────────────────────────────────────────────────────

/**
 * Parse efetch XML into a document tree.
 * Throws MalformedDocumentError when the text is not well-formed XML.
 */
export function parsePubmedXml(xml: string): PubmedDocument {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw new MalformedDocumentError(validation.err.msg, validation.err.line);
  }
  return { root: toNodeList(parser.parse(xml)) };
}
