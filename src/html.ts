/**
 * Markup that is already safe to insert into a document.
 */

export class HtmlString {
  readonly value: string;

  constructor(value: string) {
    this.value = value;
  }

  toString(): string {
    return this.value;
  }

  toJSON(): string {
    return this.value;
  }
}

export function html(text: string): HtmlString {
  return new HtmlString(text);
}

export function isHtml(value: unknown): value is HtmlString {
  return value instanceof HtmlString;
}
