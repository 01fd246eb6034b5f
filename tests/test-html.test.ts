import { describe, it, expect } from 'vitest';
import { HtmlString, html, isHtml } from '../src/html.js';
import { htmlEscape } from '../src/utils/html.js';

describe('htmlEscape', () => {
  it('escapes markup characters', () => {
    expect(htmlEscape(`<a href="x">'&'</a>`)).toBe('&lt;a href=&quot;x&quot;&gt;&#39;&amp;&#39;&lt;/a&gt;');
  });

  it('leaves plain text alone', () => {
    expect(htmlEscape('plain text 123')).toBe('plain text 123');
  });
});

describe('HtmlString', () => {
  it('wraps markup without changing it', () => {
    const h = html('<b>x</b>');
    expect(h).toBeInstanceOf(HtmlString);
    expect(`${h}`).toBe('<b>x</b>');
    expect(JSON.stringify({ h })).toBe('{"h":"<b>x</b>"}');
  });

  it('isHtml tells wrapped markup from strings', () => {
    expect(isHtml(html(''))).toBe(true);
    expect(isHtml('<b>x</b>')).toBe(false);
  });
});
