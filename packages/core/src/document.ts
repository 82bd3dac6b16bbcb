import { Container } from './container';
import { Ints } from './lists';
import { encodeMarkup } from './markup';
import { toLength, type Length, type LengthLike } from './numbers';
import { StyleTable, type Styling } from './styles';
import type {
  DocumentConfig,
  EncodeOptions,
  MarkupAttr,
  MarkupChild,
  MarkupElement,
} from './types';

export const SVG_NAMESPACE = 'http://www.w3.org/2000/svg';

/**
 * Root `<svg>` element. Holds the canvas size, the generated stylesheet and
 * the element tree.
 */
export class SvgDocument extends Container {
  viewBox?: Ints;
  width?: Length;
  height?: Length;

  private readonly config: Readonly<DocumentConfig>;
  private readonly styles: StyleTable;

  constructor(config: DocumentConfig = {}) {
    super('svg');
    this.config = { ...config };
    this.styles = new StyleTable(this.config);

    if (!this.config.embedStylesheet) {
      if (this.config.unifyStyles) {
        console.warn(
          'SvgDocument: unifyStyles has no effect without embedStylesheet'
        );
      }
      if (this.config.scopeToDocument) {
        console.warn(
          'SvgDocument: scopeToDocument has no effect without embedStylesheet'
        );
      }
    }
  }

  setViewBox(
    minX: number,
    minY: number,
    width: number,
    height: number
  ): this {
    this.viewBox = Ints.of(minX, minY, width, height);
    return this;
  }

  setSize(width: LengthLike, height: LengthLike): this {
    this.width = toLength(width);
    this.height = toLength(height);
    return this;
  }

  /**
   * Creates a styling to apply with `withStyle`.
   *
   * With `embedStylesheet` the declarations go into the document's
   * `<style>` element under a class derived from `name`, and the result
   * carries only that class. Otherwise the result is an inline style and
   * `name` is unused.
   *
   * @throws if `scopeToDocument` is set and the document has no id
   */
  makeStyle(name: string, style: string): Styling {
    return this.styles.makeStyle(name, style, this.id);
  }

  get stylesheet(): string {
    return this.styles.stylesheet;
  }

  /** Style text registered under `className` by `makeStyle`. */
  styleOf(className: string): string | undefined {
    return this.styles.styleOf(className);
  }

  toMarkup(): MarkupElement {
    const attrs: MarkupAttr[] = [
      ['xmlns', this.config.embedded ? undefined : SVG_NAMESPACE],
      ['viewBox', this.viewBox],
      ['width', this.width],
      ['height', this.height],
      ...this.objectAttrs(),
    ];
    const children: MarkupChild[] = [];
    if (this.stylesheet !== '') {
      children.push({ name: 'style', attrs: [], children: [this.stylesheet] });
    }
    children.push(...this.childMarkup());
    return { name: 'svg', attrs, children };
  }

  /** Returns the document as SVG text. */
  svg(options?: EncodeOptions): string {
    return encodeMarkup(this.toMarkup(), options);
  }
}

export function createDocument(config?: DocumentConfig): SvgDocument {
  return new SvgDocument(config);
}
