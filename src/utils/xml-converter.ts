// ---------------------------------------------------------------------------
// Structural converter: ordered XML node tree -> plain nested objects.
//
// Input is the node list fast-xml-parser produces with `preserveOrder`:
//   [{ Tag: [ ...children ], ":@": { attr: "v" } }, { "#text": "..." }]
// ---------------------------------------------------------------------------

import type { PlainObject, PlainValue } from "../core/types.js";
import { defineOwn, readOwn } from "./objects.js";

const TEXT_KEY = "#text";
const ATTRIBUTES_KEY = ":@";

/** Key under which an element's attributes are exposed. */
export const ATTRIBUTES_PROPERTY = "@attributes";

/**
 * Element names that are lists in the Qualtrics XML format.  Repeated
 * siblings with these names are collected into arrays; every other name
 * keeps only its last occurrence.
 */
export const DEFAULT_REPEATED_ELEMENTS: ReadonlySet<string> = new Set([
  "element",
  "Response",
]);

export interface XmlConvertOptions {
  repeatedElements?: ReadonlySet<string>;
}

interface ElementNode {
  name: string;
  children: unknown[];
  attributes: Record<string, string> | null;
}

/**
 * Convert a parsed XML document into plain data.
 *
 * The root element is unwrapped, so `<Response><Meta/></Response>` becomes
 * `{ Meta: "" }`.  Text-only elements become strings and empty elements
 * become `""`.  A document without a root element converts to `{}`.
 */
export function toPlain(
  nodes: unknown,
  options: XmlConvertOptions = {},
): PlainValue {
  const repeated = options.repeatedElements ?? DEFAULT_REPEATED_ELEMENTS;
  const list = Array.isArray(nodes) ? nodes : [nodes];

  for (const node of list) {
    const root = readElement(node);
    if (root) return convertElement(root, repeated);
  }
  return {};
}

function convertElement(
  element: ElementNode,
  repeated: ReadonlySet<string>,
): PlainValue {
  const out: PlainObject = {};
  if (element.attributes) {
    defineOwn(out, ATTRIBUTES_PROPERTY, { ...element.attributes });
  }

  let text = "";
  let hasChildElements = false;

  for (const child of element.children) {
    const childElement = readElement(child);
    if (childElement) {
      hasChildElements = true;
      const value = convertElement(childElement, repeated);

      if (repeated.has(childElement.name)) {
        const existing = readOwn(out, childElement.name);
        if (Array.isArray(existing)) {
          existing.push(value);
        } else {
          defineOwn(out, childElement.name, [value]);
        }
      } else {
        defineOwn(out, childElement.name, value);
      }
      continue;
    }

    const childText = readText(child);
    if (childText !== null) text += childText;
  }

  if (!hasChildElements && !element.attributes) return text;
  if (text.trim() !== "") defineOwn(out, TEXT_KEY, text);
  return out;
}

function readElement(node: unknown): ElementNode | null {
  if (!isRecord(node)) return null;

  for (const [key, value] of Object.entries(node)) {
    if (key === ATTRIBUTES_KEY || key === TEXT_KEY) continue;
    return {
      name: key,
      children: Array.isArray(value) ? value : [],
      attributes: readAttributes(node[ATTRIBUTES_KEY]),
    };
  }
  return null;
}

function readText(node: unknown): string | null {
  if (!isRecord(node) || !(TEXT_KEY in node)) return null;
  const value = node[TEXT_KEY];
  return value == null ? "" : String(value);
}

function readAttributes(value: unknown): Record<string, string> | null {
  if (!isRecord(value)) return null;
  const attributes: Record<string, string> = {};
  for (const [name, attr] of Object.entries(value)) {
    defineOwn(attributes, name, String(attr));
  }
  return attributes;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
