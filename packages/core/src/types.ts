/**
 * A composite attribute value that knows how to render itself.
 *
 * The markup encoder calls `formatAttr()` for every attribute value that is
 * neither a string nor a number. An empty result omits the attribute.
 */
export interface AttributeFormatter {
  formatAttr(): string;
}

export type AttrValue = string | number | AttributeFormatter | undefined;

export type MarkupAttr = readonly [name: string, value: AttrValue];

/** Child elements, or character data when the child is a plain string. */
export type MarkupChild = MarkupElement | string;

export interface MarkupElement {
  name: string;
  attrs: MarkupAttr[];
  children: MarkupChild[];
  /** Write the element and its subtree on one line, even when indenting. */
  inline?: boolean;
}

export interface MarkupSource {
  toMarkup(): MarkupElement;
}

export interface DocumentConfig {
  /**
   * Collect styles created with `makeStyle` into a `<style>` element
   * embedded into the document and reference them by class name.
   */
  embedStylesheet?: boolean;
  /** Reuse the class of an identical, previously registered style text. */
  unifyStyles?: boolean;
  /**
   * Prefix each generated rule with `#<document id>`, so classes stay
   * local when several documents share one HTML page. Requires a document id.
   */
  scopeToDocument?: boolean;
  /** Leave out the `xmlns` attribute (for SVG inlined into HTML). */
  embedded?: boolean;
}

export interface EncodeOptions {
  /** Written at the start of every line when pretty-printing. */
  prefix?: string;
  /** Pretty-print, nesting each level by this string. */
  indent?: string;
  /** Start the output with an XML declaration. */
  declaration?: boolean;
}

export type TextAnchor = 'start' | 'middle' | 'end';

export type LengthAdjust = 'spacing' | 'spacingAndGlyphs';
