/**
 * Tests for the Markdown note format
 */

import { describe, it, expect } from 'vitest';
import { markdownFormat, MalformedNoteError } from '../../src/corpus';

const NOTE = [
  '---',
  'type: research-note',
  'url: https://example.com/a',
  'title: "Quoted Value"',
  '---',
  '# Big Title',
  '## Section Heading One',
  '- [ ] [First linked item](https://example.com/one) — summary #keep #agents',
  '* [Second linked item](https://example.com/two).',
  'Plain https://example.com/three, and more.',
].join('\n');

describe('markdownFormat', () => {
  it('extracts every hyperlink without trailing punctuation', () => {
    expect(markdownFormat.extractLinks(NOTE)).toEqual([
      'https://example.com/a',
      'https://example.com/one',
      'https://example.com/two',
      'https://example.com/three',
    ]);
  });

  it('keeps balanced parentheses inside URLs', () => {
    const line = '- [ ] [Mamba (AI)](https://en.wikipedia.org/wiki/Mamba_(model)) — en.wikipedia.org #agents #keep';

    expect(markdownFormat.extractLinks(`${line}\n(see https://example.com/a_(b)/c).`)).toEqual([
      'https://en.wikipedia.org/wiki/Mamba_(model)',
      'https://example.com/a_(b)/c',
    ]);
    expect(markdownFormat.parseTaggedLines(line, ['#keep'])[0].link).toEqual({
      title: 'Mamba (AI)',
      url: 'https://en.wikipedia.org/wiki/Mamba_(model)',
    });
  });

  it('extracts list-link titles and level 2-4 headings from the body', () => {
    expect(markdownFormat.extractTitles(NOTE)).toEqual([
      'First linked item',
      'Second linked item',
      'Section Heading One',
    ]);
  });

  it('strips closing hashes from headings', () => {
    expect(markdownFormat.extractTitles('### Closed heading ##')).toEqual(['Closed heading']);
  });

  it('handles CRLF notes', () => {
    const text = '---\r\nurl: https://example.com/x\r\n---\r\n## Heading Number One\r\n';
    expect(markdownFormat.extractTitles(text)).toEqual(['Heading Number One']);
    expect(markdownFormat.frontmatterField(text, 'url')).toBe('https://example.com/x');
  });

  it('parses tagged lines with their first link', () => {
    expect(markdownFormat.parseTaggedLines(NOTE, ['#keep', '#good', '#bad'])).toEqual([
      {
        lineNumber: 7,
        tag: '#keep',
        text: '- [ ] [First linked item](https://example.com/one) — summary #keep #agents',
        link: { title: 'First linked item', url: 'https://example.com/one' },
      },
    ]);
  });

  it('reports one entry per tag on a line', () => {
    const tagged = markdownFormat.parseTaggedLines('- [A long enough title](https://x.dev) #keep #good', [
      '#keep',
      '#good',
    ]);
    expect(tagged.map(t => t.tag)).toEqual(['#keep', '#good']);
  });

  it('matches whole tags only', () => {
    expect(markdownFormat.hasTag('item #keep', '#keep')).toBe(true);
    expect(markdownFormat.hasTag('item #keep.', '#keep')).toBe(true);
    expect(markdownFormat.hasTag('item #kept', '#keep')).toBe(false);
    expect(markdownFormat.hasTag('item #keep-later', '#keep')).toBe(false);
    expect(markdownFormat.hasTag('item#keep', '#keep')).toBe(false);
    expect(markdownFormat.hasTag('item ##keep', '#keep')).toBe(false);
  });

  it('replaces the tag in place', () => {
    expect(markdownFormat.replaceTag('- [x] #keep #agents', '#keep', '#kept')).toBe('- [x] #kept #agents');
    expect(markdownFormat.replaceTag('- #good stuff', '#good', '#good-noted')).toBe('- #good-noted stuff');
  });

  it('reads frontmatter fields and unquotes them', () => {
    expect(markdownFormat.frontmatterField(NOTE, 'url')).toBe('https://example.com/a');
    expect(markdownFormat.frontmatterField(NOTE, 'title')).toBe('Quoted Value');
    expect(markdownFormat.frontmatterField(NOTE, 'missing')).toBeUndefined();
    expect(markdownFormat.frontmatterField('## No frontmatter here', 'url')).toBeUndefined();
  });

  it('rejects unterminated frontmatter and binary content', () => {
    expect(() => markdownFormat.validate('---\na: b\n')).toThrow(MalformedNoteError);
    expect(() => markdownFormat.validate('abc\u0000def')).toThrow(MalformedNoteError);
    expect(() => markdownFormat.validate(NOTE)).not.toThrow();
  });
});
