import { FootnoteExtractionError } from '../../src/core/errors';
import { convertFootnotes, footnoteLink } from '../../src/transform/rewriteRules/footnotes';

describe('footnotes rule', () => {
  it('builds a superscript link', () => {
    expect(footnoteLink('2', 'https://example.com')).toBe('<a href="https://example.com"><sup>2</sup></a>');
  });

  it('links markers and drops the definition paragraph', () => {
    const html =
      '<p>See the docs[^1].</p>\n' +
      '<p>[^1]: Source <a href="https://example.com/docs">docs</a></p>\n';
    expect(convertFootnotes(html))
      .toBe('<p>See the docs<a href="https://example.com/docs"><sup>1</sup></a>.</p>\n');
  });

  it('keeps the rest of a paragraph holding several definitions', () => {
    const html =
      '<p>a[^1] b[^2]</p>\n' +
      '<p>[^1]: <a href="u1">one</a>\n[^2]: <a href="u2">two</a></p>\n';
    expect(convertFootnotes(html))
      .toBe('<p>a<a href="u1"><sup>1</sup></a> b<a href="u2"><sup>2</sup></a></p>\n');
  });

  it('accepts a definition without a colon when it carries a link', () => {
    const html =
      '<p>Body text[^1].</p>\n' +
      '<p>[^1] Source <a href="http://x">text</a></p>\n';
    expect(convertFootnotes(html)).toBe('<p>Body text<a href="http://x"><sup>1</sup></a>.</p>\n');
  });

  it('keeps a paragraph that only starts with a marker', () => {
    const html = '<p>[^1] starts this paragraph</p>\n<p>[^1]: <a href="u">x</a></p>\n';
    expect(convertFootnotes(html)).toBe('<p><a href="u"><sup>1</sup></a> starts this paragraph</p>\n');
    expect(convertFootnotes('<p>[^2] no link here</p>\n')).toBe('<p>[^2] no link here</p>\n');
  });

  it('leaves markers without a definition alone', () => {
    const html = '<p>a[^1] b[^3]</p>\n<p>[^1]: <a href="u">x</a></p>\n';
    expect(convertFootnotes(html)).toBe('<p>a<a href="u"><sup>1</sup></a> b[^3]</p>\n');
  });

  it('returns html without definitions unchanged', () => {
    expect(convertFootnotes('<p>a[^1]</p>\n')).toBe('<p>a[^1]</p>\n');
  });

  it('does not touch CDATA sections', () => {
    const html =
      '<p>x[^1]</p>\n' +
      '<ac:plain-text-body><![CDATA[arr[^1]]]></ac:plain-text-body>\n' +
      '<p>[^1]: <a href="u">x</a></p>\n';
    expect(convertFootnotes(html))
      .toBe('<p>x<a href="u"><sup>1</sup></a></p>\n<ac:plain-text-body><![CDATA[arr[^1]]]></ac:plain-text-body>\n');
  });

  it('fails on a definition without a link', () => {
    let caught: unknown;
    try {
      convertFootnotes('<p>[^2]: no link here</p>\n');
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(FootnoteExtractionError);
    expect(caught).toMatchObject({ footnoteId: '2', definition: 'no link here' });
  });
});
