import { describe, expect, it } from 'vitest';
import { Container } from './container';
import { encodeMarkup } from './markup';

function render(c: Container): string {
  return encodeMarkup(c.toMarkup());
}

describe('Container', () => {
  it('renders basic shapes with their geometry first', () => {
    const g = new Container();
    g.line(0, 0, 10, 20).setId('l').setStyle('stroke:red;');
    g.rect(1, 2, 3, 4);
    g.circle(5, 5, 2.5);
    g.ellipse(5, 6, 3, 2);
    expect(render(g)).toBe(
      '<g>' +
        '<line x1="0" y1="0" x2="10" y2="20" id="l" style="stroke:red"/>' +
        '<rect x="1" y="2" width="3" height="4"/>' +
        '<circle cx="5" cy="5" r="2.5"/>' +
        '<ellipse cx="5" cy="6" rx="3" ry="2"/>' +
        '</g>'
    );
  });

  it('keeps children in insertion order', () => {
    const g = new Container();
    g.rect(0, 0, 1, 1).setId('A');
    g.circle(0, 0, 1).setId('B');
    g.line(0, 0, 1, 1).setId('C');
    expect(g.size).toBe(3);
    expect(render(g).match(/id="\w"/g)).toEqual(['id="A"', 'id="B"', 'id="C"']);
  });

  it('renders polylines and polygons from their points', () => {
    const g = new Container();
    g.polyline().add(10, 20).add(30, 40);
    g.polygon();
    expect(render(g)).toBe(
      '<g><polyline points="10,20 30,40"/><polygon/></g>'
    );
  });

  it('exposes the points of a polyline', () => {
    const line = new Container().polyline().add(1, 2);
    line.points.add(3, 4);
    expect(line.points.formatAttr()).toBe('1,2 3,4');
  });

  it('applies transforms and classes to groups', () => {
    const root = new Container();
    const layer = root.group().setId('layer');
    layer.transform.translate(10, 20).rotate(45);
    layer.circle(0, 0, 1).setClass('dot');
    expect(render(root)).toBe(
      '<g><g id="layer" transform="translate(10,20) rotate(45)">' +
        '<circle cx="0" cy="0" r="1" class="dot"/></g></g>'
    );
  });

  it('references definitions with use', () => {
    const root = new Container();
    root.defs().circle(0, 0, 4).setId('dot');
    root.group().use(10, 10, 'dot');
    root.use(0, 5, 'dot').transform.scale(2);
    expect(render(root)).toBe(
      '<g><defs><circle cx="0" cy="0" r="4" id="dot"/></defs>' +
        '<g><use x="10" y="10" href="#dot"/></g>' +
        '<use y="5" href="#dot" transform="scale(2)"/></g>'
    );
  });

  it('adds titles as character data', () => {
    const g = new Container().title('Chart & data');
    expect(render(g)).toBe('<g><title>Chart &amp; data</title></g>');
  });

  it('writes class and style side by side', () => {
    const g = new Container();
    g.rect(0, 0, 1, 1).setClass('box').setStyle('opacity:0.5');
    expect(render(g)).toBe(
      '<g><rect x="0" y="0" width="1" height="1" class="box" style="opacity:0.5"/></g>'
    );
  });
});
