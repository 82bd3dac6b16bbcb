import type { AttributeFormatter } from './types';

/**
 * Shortest decimal text that parses back to the same number.
 * Integers print without a decimal point.
 */
export function formatNumber(value: number): string {
  if (!Number.isFinite(value)) {
    throw new Error(`formatNumber: non-finite value ${value}`);
  }
  return String(value);
}

/** `undefined` for zero, so optional coordinates drop out of the markup. */
export function omitZero(value: number): number | undefined {
  return value === 0 ? undefined : value;
}

export type LengthUnit = '' | 'em' | 'ex' | 'px' | '%';

/** A number with an optional unit suffix, e.g. `1.5em` or `50%`. */
export class Length implements AttributeFormatter {
  constructor(
    readonly value: number,
    readonly unit: LengthUnit = ''
  ) {}

  formatAttr(): string {
    return formatNumber(this.value) + this.unit;
  }
}

/** Plain numbers are taken as unitless lengths. */
export type LengthLike = Length | number;

export function toLength(value: LengthLike): Length {
  return typeof value === 'number' ? new Length(value) : value;
}

export function num(value: number): Length {
  return new Length(value);
}

export function em(value: number): Length {
  return new Length(value, 'em');
}

export function ex(value: number): Length {
  return new Length(value, 'ex');
}

export function px(value: number): Length {
  return new Length(value, 'px');
}

export function percent(value: number): Length {
  return new Length(value, '%');
}
