/**
 * Scanline — Library Note
 *
 * Standalone research note created when a reading-list line is tagged
 * for promotion. The `url` frontmatter field is how an existing library
 * note is found again.
 */

export interface LibraryEntry {
  title: string;
  url: string;
  summary: string;
  topicSlug: string;
  /** YYYY-MM-DD of the daily note the item was found in, or '' */
  dateFound: string;
  /** YYYY-MM-DD */
  dateSaved: string;
}

const MAX_SLUG_CHARS = 60;

export function slugify(title: string): string {
  const slug = title
    .toLowerCase()
    .replace(/[^a-z0-9_\s-]/g, '')
    .replace(/[\s_]+/g, '-')
    .replace(/-+/g, '-')
    .replace(/^-|-$/g, '')
    .slice(0, MAX_SLUG_CHARS)
    .replace(/-$/, '');
  return slug || 'untitled';
}

/**
 * First free `<folder>/<slug>.md`, then `-2`, `-3`...
 */
export async function uniqueNotePath(
  folder: string,
  slug: string,
  exists: (notePath: string) => Promise<boolean>
): Promise<string> {
  let candidate = `${folder}/${slug}.md`;
  for (let i = 2; await exists(candidate); i++) {
    candidate = `${folder}/${slug}-${i}.md`;
  }
  return candidate;
}

export function renderLibraryNote(entry: LibraryEntry): string {
  return [
    '---',
    'type: research-note',
    `url: ${entry.url}`,
    `date_found: ${entry.dateFound}`,
    `date_saved: ${entry.dateSaved}`,
    `tags: [${entry.topicSlug}]`,
    'status: unread',
    '---',
    '',
    `# ${entry.title}`,
    '',
    `> **Link**: [${entry.title}](${entry.url})`,
    `> **Found**: ${entry.dateFound}`,
    '',
    '## Summary',
    '',
    entry.summary,
    '',
    '## My Notes',
    '',
    '',
  ].join('\n');
}
