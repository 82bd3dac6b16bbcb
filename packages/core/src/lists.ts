import { formatNumber } from './numbers';
import type { AttributeFormatter } from './types';

export function joinList(values: readonly string[]): string {
  return values.join(' ');
}

/** Space separated integers, as used by `viewBox`. */
export class Ints implements AttributeFormatter {
  private readonly values: number[] = [];

  static of(...values: number[]): Ints {
    return new Ints().push(...values);
  }

  push(...values: number[]): this {
    for (const v of values) {
      if (!Number.isInteger(v)) {
        throw new Error(`Ints.push: ${v} is not an integer`);
      }
      this.values.push(v);
    }
    return this;
  }

  get size(): number {
    return this.values.length;
  }

  toArray(): number[] {
    return [...this.values];
  }

  formatAttr(): string {
    return joinList(this.values.map(formatNumber));
  }
}

/** Space separated numbers, e.g. the per-glyph `rotate` of a text element. */
export class Floats implements AttributeFormatter {
  private readonly values: number[] = [];

  static of(...values: number[]): Floats {
    return new Floats().push(...values);
  }

  push(...values: number[]): this {
    this.values.push(...values);
    return this;
  }

  get size(): number {
    return this.values.length;
  }

  toArray(): number[] {
    return [...this.values];
  }

  formatAttr(): string {
    return joinList(this.values.map(formatNumber));
  }
}

export type Point = readonly [x: number, y: number];

/** Coordinate pairs rendered as `x,y x,y ...`. */
export class Points implements AttributeFormatter {
  private readonly points: Point[] = [];

  add(x: number, y: number): this {
    this.points.push([x, y]);
    return this;
  }

  get size(): number {
    return this.points.length;
  }

  toArray(): Point[] {
    return [...this.points];
  }

  formatAttr(): string {
    return joinList(
      this.points.map(([x, y]) => `${formatNumber(x)},${formatNumber(y)}`)
    );
  }
}
