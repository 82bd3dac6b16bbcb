import { Points } from './lists';
import { omitZero } from './numbers';
import { SvgObject } from './objects';
import type { MarkupElement, MarkupSource } from './types';

export class Line extends SvgObject {
  constructor(
    readonly x1: number,
    readonly y1: number,
    readonly x2: number,
    readonly y2: number
  ) {
    super();
  }

  toMarkup(): MarkupElement {
    return {
      name: 'line',
      attrs: [
        ['x1', this.x1],
        ['y1', this.y1],
        ['x2', this.x2],
        ['y2', this.y2],
        ...this.objectAttrs(),
      ],
      children: [],
    };
  }
}

export class Rect extends SvgObject {
  constructor(
    readonly x: number,
    readonly y: number,
    readonly width: number,
    readonly height: number
  ) {
    super();
  }

  toMarkup(): MarkupElement {
    return {
      name: 'rect',
      attrs: [
        ['x', this.x],
        ['y', this.y],
        ['width', this.width],
        ['height', this.height],
        ...this.objectAttrs(),
      ],
      children: [],
    };
  }
}

export class Circle extends SvgObject {
  constructor(
    readonly cx: number,
    readonly cy: number,
    readonly r: number
  ) {
    super();
  }

  toMarkup(): MarkupElement {
    return {
      name: 'circle',
      attrs: [
        ['cx', this.cx],
        ['cy', this.cy],
        ['r', this.r],
        ...this.objectAttrs(),
      ],
      children: [],
    };
  }
}

export class Ellipse extends SvgObject {
  constructor(
    readonly cx: number,
    readonly cy: number,
    readonly rx: number,
    readonly ry: number
  ) {
    super();
  }

  toMarkup(): MarkupElement {
    return {
      name: 'ellipse',
      attrs: [
        ['cx', this.cx],
        ['cy', this.cy],
        ['rx', this.rx],
        ['ry', this.ry],
        ...this.objectAttrs(),
      ],
      children: [],
    };
  }
}

/**
 * Open (`<polyline>`) or closed (`<polygon>`) path through a list of
 * points. Starts empty; points are added with `add`.
 */
export class PolyLine extends SvgObject {
  readonly points = new Points();

  constructor(private readonly tagName: 'polyline' | 'polygon' = 'polyline') {
    super();
  }

  add(x: number, y: number): this {
    this.points.add(x, y);
    return this;
  }

  toMarkup(): MarkupElement {
    return {
      name: this.tagName,
      attrs: [['points', this.points], ...this.objectAttrs()],
      children: [],
    };
  }
}

/** `<use>` referencing another element of the document by id. */
export class Use extends SvgObject {
  constructor(
    readonly x: number,
    readonly y: number,
    readonly refId: string
  ) {
    super();
  }

  toMarkup(): MarkupElement {
    return {
      name: 'use',
      attrs: [
        ['x', omitZero(this.x)],
        ['y', omitZero(this.y)],
        ['href', `#${this.refId}`],
        ...this.objectAttrs(),
      ],
      children: [],
    };
  }
}

export class Title implements MarkupSource {
  constructor(readonly content: string) {}

  toMarkup(): MarkupElement {
    return {
      name: 'title',
      attrs: [],
      children: this.content === '' ? [] : [this.content],
    };
  }
}
