import { SvgObject } from './objects';
import { Circle, Ellipse, Line, PolyLine, Rect, Title, Use } from './shapes';
import { TextObject } from './text';
import type { MarkupElement, MarkupSource } from './types';

/**
 * An element holding child elements, which may itself be styled and
 * transformed. Children are written in the order they were appended, which
 * is also their paint order. There is no removal or reordering.
 */
export class Container extends SvgObject {
  private readonly elements: MarkupSource[] = [];

  constructor(private readonly tagName: string = 'g') {
    super();
  }

  get size(): number {
    return this.elements.length;
  }

  get children(): readonly MarkupSource[] {
    return this.elements;
  }

  private append<T extends MarkupSource>(el: T): T {
    this.elements.push(el);
    return el;
  }

  /** Appends a `<g>` element. */
  group(): Container {
    return this.append(new Container('g'));
  }

  /** Appends a `<defs>` element; its children are not rendered directly. */
  defs(): Container {
    return this.append(new Container('defs'));
  }

  title(content: string): this {
    this.append(new Title(content));
    return this;
  }

  use(x: number, y: number, refId: string): SvgObject {
    return this.append(new Use(x, y, refId));
  }

  line(x1: number, y1: number, x2: number, y2: number): SvgObject {
    return this.append(new Line(x1, y1, x2, y2));
  }

  rect(x: number, y: number, width: number, height: number): SvgObject {
    return this.append(new Rect(x, y, width, height));
  }

  circle(cx: number, cy: number, r: number): SvgObject {
    return this.append(new Circle(cx, cy, r));
  }

  ellipse(cx: number, cy: number, rx: number, ry: number): SvgObject {
    return this.append(new Ellipse(cx, cy, rx, ry));
  }

  polyline(): PolyLine {
    return this.append(new PolyLine('polyline'));
  }

  polygon(): PolyLine {
    return this.append(new PolyLine('polygon'));
  }

  text(x: number, y: number, content = ''): TextObject {
    const t = new TextObject('text', x, y);
    if (content !== '') t.addText(content);
    return this.append(t);
  }

  protected childMarkup(): MarkupElement[] {
    return this.elements.map((el) => el.toMarkup());
  }

  toMarkup(): MarkupElement {
    return {
      name: this.tagName,
      attrs: this.objectAttrs(),
      children: this.childMarkup(),
    };
  }
}
