/**
 * Scanline — Note Format
 *
 * Parses notes into the pieces the pipeline cares about: hyperlinks,
 * item titles, and lines carrying a workflow tag. The history index and
 * the promotion tracker depend on this interface, not on Markdown.
 */

export interface NoteLink {
  title: string;
  url: string;
}

export interface TaggedLine {
  lineNumber: number;
  tag: string;
  text: string;
  /** First link on the line, if any */
  link: NoteLink | null;
}

export interface NoteFormat {
  /** Throws MalformedNoteError when the note cannot be interpreted */
  validate(text: string): void;
  extractLinks(text: string): string[];
  extractTitles(text: string): string[];
  parseTaggedLines(text: string, tags: readonly string[]): TaggedLine[];
  hasTag(line: string, tag: string): boolean;
  /** Replace the first whole-tag occurrence of `from` with `to` */
  replaceTag(line: string, from: string, to: string): string;
  frontmatterField(text: string, field: string): string | undefined;
}

export class MalformedNoteError extends Error {
  constructor(reason: string) {
    super(reason);
    this.name = 'MalformedNoteError';
  }
}

// ============================================================
// MARKDOWN
// ============================================================

// One level of balanced parentheses stays in the URL: `wiki/Mamba_(model)`
const URL_RE = /https?:\/\/(?:[^\s()[\]<>"']|\([^\s()[\]<>"']*\))+/g;
const LIST_LINK_TITLE_RE = /^[ \t]*[-*][ \t]*(?:\[[ xX]\][ \t]*)?\[([^\]]+)\]\(/gm;
const HEADING_RE = /^#{2,4}[ \t]+(.+?)[ \t]*#*[ \t]*$/gm;
const LINK_RE = /\[([^\]]+)\]\((https?:\/\/(?:[^()\s]|\([^()\s]*\))+)\)/;

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function tagRegex(tag: string): RegExp {
  // `#keep` must not match `#kept`, `#keep-later` or `foo#keep`
  return new RegExp(`(?<![\\w#-])${escapeRegex(tag)}(?![\\w-])`);
}

function splitFrontmatter(text: string): { frontmatter: string | null; body: string } {
  const lines = text.split(/\r?\n/);
  if (lines[0].trim() !== '---') {
    return { frontmatter: null, body: text };
  }
  const end = lines.findIndex((line, i) => i > 0 && line.trim() === '---');
  if (end === -1) {
    throw new MalformedNoteError('Unterminated frontmatter block');
  }
  return {
    frontmatter: lines.slice(1, end).join('\n'),
    body: lines.slice(end + 1).join('\n'),
  };
}

export const markdownFormat: NoteFormat = {
  validate(text) {
    if (text.includes('\u0000')) {
      throw new MalformedNoteError('Binary content');
    }
    splitFrontmatter(text);
  },

  extractLinks(text) {
    const urls: string[] = [];
    for (const match of text.matchAll(URL_RE)) {
      urls.push(match[0].replace(/[.,;:!?]+$/, ''));
    }
    return urls;
  },

  extractTitles(text) {
    const { body } = splitFrontmatter(text);
    const titles: string[] = [];
    for (const match of body.matchAll(LIST_LINK_TITLE_RE)) {
      titles.push(match[1].trim());
    }
    for (const match of body.matchAll(HEADING_RE)) {
      titles.push(match[1].trim());
    }
    return titles;
  },

  parseTaggedLines(text, tags) {
    const matchers = tags.map(tag => ({ tag, re: tagRegex(tag) }));
    const result: TaggedLine[] = [];

    text.split(/\r?\n/).forEach((line, lineNumber) => {
      for (const { tag, re } of matchers) {
        if (!re.test(line)) continue;
        const link = LINK_RE.exec(line);
        result.push({
          lineNumber,
          tag,
          text: line,
          link: link ? { title: link[1].trim(), url: link[2] } : null,
        });
      }
    });

    return result;
  },

  hasTag(line, tag) {
    return tagRegex(tag).test(line);
  },

  replaceTag(line, from, to) {
    return line.replace(tagRegex(from), to);
  },

  frontmatterField(text, field) {
    const { frontmatter } = splitFrontmatter(text);
    if (frontmatter === null) return undefined;
    const re = new RegExp(`^${escapeRegex(field)}:\\s*(.*?)\\s*$`, 'm');
    const match = re.exec(frontmatter);
    return match ? match[1].replace(/^["']|["']$/g, '') : undefined;
  },
};
