import { describe, expect, it } from 'vitest';
import { em } from './numbers';
import { formatTransform, numberArg, TransformList } from './transform';

describe('TransformList', () => {
  it('is empty by default', () => {
    const tl = new TransformList();
    expect(tl.isEmpty()).toBe(true);
    expect(tl.size).toBe(0);
    expect(tl.formatAttr()).toBe('');
  });

  it('keeps the order transforms were added in', () => {
    const tl = new TransformList().translate(1, 2).rotate(30);
    expect(tl.formatAttr()).toBe('translate(1,2) rotate(30)');

    const reversed = new TransformList().rotate(30).translate(1, 2);
    expect(reversed.formatAttr()).toBe('rotate(30) translate(1,2)');
  });

  it('renders skews', () => {
    const tl = new TransformList().skewX(10).skewY(-5.5);
    expect(tl.formatAttr()).toBe('skewX(10) skewY(-5.5)');
  });

  it('renders rotation about a point, scale and matrix', () => {
    expect(new TransformList().rotateAbout(45, 10, 20).formatAttr()).toBe(
      'rotate(45,10,20)'
    );
    expect(new TransformList().scale(2).formatAttr()).toBe('scale(2)');
    expect(new TransformList().scale(2, 0.5).formatAttr()).toBe(
      'scale(2,0.5)'
    );
    expect(new TransformList().matrix(1, 0, 0, 1, 5, 6).formatAttr()).toBe(
      'matrix(1,0,0,1,5,6)'
    );
  });

  it('accepts transforms with custom arguments', () => {
    const tl = new TransformList().append({
      name: 'translate',
      args: [{ formatArg: () => em(1).formatAttr() }, numberArg(0)],
    });
    expect(tl.formatAttr()).toBe('translate(1em,0)');
  });

  it('exposes the operations', () => {
    const tl = new TransformList().translate(3, 4).skewX(1);
    const ops = tl.toArray();
    expect(ops.map((t) => t.name)).toEqual(['translate', 'skewX']);
    expect(formatTransform(ops[0]!)).toBe('translate(3,4)');
  });
});
