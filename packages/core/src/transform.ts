import { joinList } from './lists';
import { formatNumber } from './numbers';
import type { AttributeFormatter } from './types';

export interface TransformArg {
  formatArg(): string;
}

export function numberArg(value: number): TransformArg {
  return { formatArg: () => formatNumber(value) };
}

/** One transform function, e.g. `translate` with its two arguments. */
export interface Transform {
  name: string;
  args: TransformArg[];
}

/** Renders `name(a,b,...)`. */
export function formatTransform(t: Transform): string {
  return `${t.name}(${t.args.map((a) => a.formatArg()).join(',')})`;
}

function numeric(name: string, ...values: number[]): Transform {
  return { name, args: values.map(numberArg) };
}

/**
 * Ordered list of transforms for the `transform` attribute.
 *
 * Transforms are applied in the order they were added; the list is
 * append-only.
 */
export class TransformList implements AttributeFormatter {
  private readonly ops: Transform[] = [];

  /** Adds a transform of any kind, including ones without a helper below. */
  append(t: Transform): this {
    this.ops.push(t);
    return this;
  }

  translate(x: number, y: number): this {
    return this.append(numeric('translate', x, y));
  }

  /** Rotation by `degrees` around the origin of the current user space. */
  rotate(degrees: number): this {
    return this.append(numeric('rotate', degrees));
  }

  /** Rotation by `degrees` around the point (`cx`, `cy`). */
  rotateAbout(degrees: number, cx: number, cy: number): this {
    return this.append(numeric('rotate', degrees, cx, cy));
  }

  scale(sx: number, sy?: number): this {
    return this.append(
      sy === undefined ? numeric('scale', sx) : numeric('scale', sx, sy)
    );
  }

  skewX(degrees: number): this {
    return this.append(numeric('skewX', degrees));
  }

  skewY(degrees: number): this {
    return this.append(numeric('skewY', degrees));
  }

  matrix(
    a: number,
    b: number,
    c: number,
    d: number,
    e: number,
    f: number
  ): this {
    return this.append(numeric('matrix', a, b, c, d, e, f));
  }

  get size(): number {
    return this.ops.length;
  }

  isEmpty(): boolean {
    return this.ops.length === 0;
  }

  toArray(): Transform[] {
    return [...this.ops];
  }

  formatAttr(): string {
    return joinList(this.ops.map(formatTransform));
  }
}
