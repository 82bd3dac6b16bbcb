import { Floats } from './lists';
import { omitZero, toLength, type Length, type LengthLike } from './numbers';
import { SvgObject } from './objects';
import type {
  LengthAdjust,
  MarkupChild,
  MarkupElement,
  TextAnchor,
} from './types';

/**
 * Properties shared by `<text>` and `<tspan>`.
 *
 * The content is a sequence of character data and nested spans, kept in
 * the order it was added:
 *
 * ```ts
 * doc.text(10, 20, 'E = mc').addSpan('2').setStyle('baseline-shift:super');
 * ```
 */
export class TextObject extends SvgObject {
  dx?: Length;
  dy?: Length;
  textAnchor?: TextAnchor;
  textLength?: Length;
  lengthAdjust?: LengthAdjust;
  readonly glyphRotation = new Floats();

  private readonly content: Array<string | TextObject> = [];

  constructor(
    private readonly tagName: 'text' | 'tspan',
    public x = 0,
    public y = 0
  ) {
    super();
  }

  at(x: number, y: number): this {
    this.x = x;
    this.y = y;
    return this;
  }

  offset(dx: LengthLike, dy: LengthLike): this {
    this.dx = toLength(dx);
    this.dy = toLength(dy);
    return this;
  }

  anchor(anchor: TextAnchor): this {
    this.textAnchor = anchor;
    return this;
  }

  /** Stretches or squeezes the text to `length`. */
  fitLength(length: LengthLike, adjust?: LengthAdjust): this {
    this.textLength = toLength(length);
    this.lengthAdjust = adjust;
    return this;
  }

  /** Per-glyph rotation in degrees; the last value applies to the rest. */
  rotateGlyphs(...degrees: number[]): this {
    this.glyphRotation.push(...degrees);
    return this;
  }

  /** Appends a `<tspan>` and returns it. */
  addSpan(content = ''): TextObject {
    const span = new TextObject('tspan');
    if (content !== '') span.addText(content);
    this.content.push(span);
    return span;
  }

  /** Appends more character data, e.g. after a span. */
  addText(content: string): this {
    this.content.push(content);
    return this;
  }

  toMarkup(): MarkupElement {
    const children: MarkupChild[] = this.content.map((c) =>
      typeof c === 'string' ? c : c.toMarkup()
    );
    return {
      name: this.tagName,
      attrs: [
        ['x', omitZero(this.x)],
        ['y', omitZero(this.y)],
        ['dx', this.dx],
        ['dy', this.dy],
        ['text-anchor', this.textAnchor],
        ['textLength', this.textLength],
        ['lengthAdjust', this.lengthAdjust],
        ['rotate', this.glyphRotation],
        ...this.objectAttrs(),
      ],
      children,
      inline: true,
    };
  }
}
