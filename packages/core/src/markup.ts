/**
 * Generic element-tree to XML text encoder.
 *
 * Knows nothing about SVG: it writes whatever `MarkupElement` tree it is
 * given, formats attribute values and escapes text.
 */

import { formatNumber } from './numbers';
import type {
  AttrValue,
  EncodeOptions,
  MarkupAttr,
  MarkupChild,
  MarkupElement,
} from './types';

export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

/** Escape a string for safe use inside an XML attribute value. */
export function escapeXmlAttr(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/"/g, '&quot;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;');
}

/** Escape character data. */
export function escapeXmlText(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;');
}

/**
 * Text of an attribute value, or `undefined` when the attribute is to be
 * left out (no value, or a value that formats to an empty string).
 */
export function formatAttrValue(value: AttrValue): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value === 'number') return formatNumber(value);
  const text = typeof value === 'string' ? value : value.formatAttr();
  return text === '' ? undefined : text;
}

export function attributeString(attrs: readonly MarkupAttr[]): string {
  let out = '';
  for (const [name, value] of attrs) {
    const text = formatAttrValue(value);
    if (text !== undefined) out += ` ${name}="${escapeXmlAttr(text)}"`;
  }
  return out;
}

interface Layout {
  prefix: string;
  indent: string;
}

function newline(layout: Layout, depth: number): string {
  return `\n${layout.prefix}${layout.indent.repeat(depth)}`;
}

function encodeChild(
  child: MarkupChild,
  layout: Layout | null,
  depth: number
): string {
  return typeof child === 'string'
    ? escapeXmlText(child)
    : encodeElement(child, layout, depth);
}

function encodeElement(
  el: MarkupElement,
  layout: Layout | null,
  depth: number
): string {
  const open = `<${el.name}${attributeString(el.attrs)}`;
  if (el.children.length === 0) return `${open}/>`;

  // Whitespace around character data would become part of the text.
  const mixed = el.children.some((c) => typeof c === 'string');
  if (!layout || el.inline || mixed) {
    const inner = el.children.map((c) => encodeChild(c, null, 0)).join('');
    return `${open}>${inner}</${el.name}>`;
  }

  const inner = el.children
    .map((c) => newline(layout, depth + 1) + encodeChild(c, layout, depth + 1))
    .join('');
  return `${open}>${inner}${newline(layout, depth)}</${el.name}>`;
}

/**
 * Serialises `root` and its subtree.
 *
 * Pretty-printing is enabled by passing `indent` (an empty string puts each
 * element on its own line without nesting). Elements without children are
 * self-closing.
 */
export function encodeMarkup(
  root: MarkupElement,
  options: EncodeOptions = {}
): string {
  const layout: Layout | null =
    options.indent === undefined
      ? null
      : { prefix: options.prefix ?? '', indent: options.indent };

  const body = (layout?.prefix ?? '') + encodeElement(root, layout, 0);
  return options.declaration ? `${XML_DECLARATION}\n${body}` : body;
}
