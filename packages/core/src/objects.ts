import type { Stylable } from './styles';
import { Styling } from './styles';
import { TransformList } from './transform';
import type { MarkupAttr, MarkupElement, MarkupSource } from './types';

/**
 * Attributes every drawable element carries: identity, transform and
 * styling. Appending an element to a container hands back this handle.
 */
export abstract class SvgObject implements Stylable, MarkupSource {
  id = '';
  readonly transform = new TransformList();
  readonly styling = new Styling();

  setId(id: string): this {
    this.id = id;
    return this;
  }

  setClass(className: string): this {
    this.styling.setClass(className);
    return this;
  }

  setStyle(style: string): this {
    this.styling.setStyle(style);
    return this;
  }

  withStyle(styling: Styling): this {
    this.styling.withStyle(styling);
    return this;
  }

  abstract toMarkup(): MarkupElement;

  /** `id`, `transform`, `class` and `style`, in that order. */
  protected objectAttrs(): MarkupAttr[] {
    return [
      ['id', this.id],
      ['transform', this.transform],
      ['class', this.styling.class],
      ['style', this.styling.style],
    ];
  }
}
