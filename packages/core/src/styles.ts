import type { DocumentConfig } from './types';

/** Drops a single trailing `;` from a declaration block. */
export function trimDeclaration(style: string): string {
  return style.endsWith(';') ? style.slice(0, -1) : style;
}

/**
 * The `class` and `style` attributes of an element.
 *
 * Both may be set; when a class is present it is expected to carry the
 * styling, and `style` only adds inline overrides.
 */
export class Styling {
  class = '';
  style = '';

  setStyle(style: string): this {
    this.style = trimDeclaration(style);
    return this;
  }

  setClass(className: string): this {
    this.class = className;
    return this;
  }

  /** Replaces both fields with the ones of `styling`. */
  withStyle(styling: Styling): this {
    this.class = styling.class;
    this.style = styling.style;
    return this;
  }
}

export interface Stylable {
  setClass(className: string): this;
  setStyle(style: string): this;
  withStyle(styling: Styling): this;
}

/**
 * Per-document registry turning style declarations into stylesheet classes.
 *
 * Class names are unique within the table. A requested name that is taken
 * gets the next value of the conflict counter appended; the counter never
 * goes back, so a suffix is never handed out twice.
 */
export class StyleTable {
  private readonly classByStyle = new Map<string, string>();
  private readonly styleByClass = new Map<string, string>();
  private conflicts = 0;
  private rules = '';

  constructor(private readonly config: Readonly<DocumentConfig>) {}

  /** The accumulated rules, separated by single spaces. */
  get stylesheet(): string {
    return this.rules;
  }

  get classNames(): string[] {
    return [...this.styleByClass.keys()];
  }

  /** The style text registered for `className`, if any. */
  styleOf(className: string): string | undefined {
    return this.styleByClass.get(className);
  }

  /**
   * Returns the styling for a declaration block.
   *
   * Without `embedStylesheet` the result is an inline style (or, for an
   * empty declaration, just the requested class). Otherwise a rule
   * `.name {decls}` is appended to the stylesheet and the result
   * references it by class.
   *
   * @param documentId id of the owning document, used as the rule scope
   */
  makeStyle(name: string, style: string, documentId: string): Styling {
    if (!this.config.embedStylesheet) {
      if (style !== '') return new Styling().setStyle(style);
      return new Styling().setClass(name);
    }

    if (this.config.unifyStyles) {
      const existing = this.classByStyle.get(style);
      if (existing !== undefined) return new Styling().setClass(existing);
    }

    let scope = '';
    if (this.config.scopeToDocument) {
      if (documentId === '') {
        throw new Error(
          'StyleTable.makeStyle: scopeToDocument requires a document id'
        );
      }
      scope = `#${documentId} `;
    }

    const className = this.claimClassName(name);
    if (this.config.unifyStyles) this.classByStyle.set(style, className);
    this.styleByClass.set(className, style);

    if (this.rules !== '') this.rules += ' ';
    this.rules += `${scope}.${className} {${trimDeclaration(style)}}`;

    return new Styling().setClass(className);
  }

  private claimClassName(name: string): string {
    if (!this.styleByClass.has(name)) return name;
    let candidate: string;
    do {
      this.conflicts++;
      candidate = `${name}${this.conflicts}`;
    } while (this.styleByClass.has(candidate));
    return candidate;
  }
}
