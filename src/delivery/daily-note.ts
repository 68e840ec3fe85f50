/**
 * Scanline — Daily Note
 *
 * Renders the digest as the day's Markdown note. Every item is written
 * as a task-list link so the operator can tag it for promotion or
 * feedback, and so the next run's history index picks it up.
 */

import type { ClassifiedItem, FeedbackStats, PipelineConfig } from '../types';
import type { Digest } from '../matching/ranker';
import { hostOf } from '../lib/fingerprint';
import type { SynthesisSections } from './synthesis';
import { uniqueNotePath } from './library-note';

export interface DailyNoteInput {
  /** YYYY-MM-DD */
  date: string;
  digest: Digest;
  synthesis: SynthesisSections;
  config: PipelineConfig;
  /** Feedback resolved by this run's sweep, with lifetime totals */
  feedback?: { good: number; bad: number; lifetime: FeedbackStats };
}

const MUST_FOLLOW_TEXT_CHARS = 200;
const OTHER_GROUP = 'Other';

const HEADINGS = {
  briefing: "Today's Briefing",
  mustFollow: 'Must Follow',
  labPulse: 'Lab Pulse',
  deepDives: 'Deep Dives',
  readingList: 'Reading List',
  promote: 'Promote to Library',
  rate: 'Rate Results',
} as const;

/**
 * Every heading the renderer writes for this config. These are
 * structure, not item titles, and stay out of the history index.
 */
export function noteHeadings(config: PipelineConfig): string[] {
  return [
    ...new Set([
      ...Object.values(HEADINGS),
      ...config.topics.map(t => t.displayName),
      ...config.mustFollow.map(a => a.group),
      OTHER_GROUP,
    ]),
  ];
}

// ============================================================
// PATHS
// ============================================================

/**
 * `<folder>/YYYY/MM/YYYY-MM-DD.md`, suffixed `-2`, `-3`... if taken.
 */
export async function dailyNotePath(
  folder: string,
  date: string,
  exists: (notePath: string) => Promise<boolean>
): Promise<string> {
  const [year, month] = date.split('-');
  return uniqueNotePath(`${folder}/${year}/${month}`, date, exists);
}

export function formatDisplayDate(date: string): string {
  const parsed = new Date(`${date}T00:00:00Z`);
  if (Number.isNaN(parsed.getTime())) return date;
  return parsed.toLocaleDateString('en-US', {
    month: 'short',
    day: '2-digit',
    year: 'numeric',
    timeZone: 'UTC',
  });
}

// ============================================================
// LINES
// ============================================================

/** Link text must not close the Markdown link early */
export function linkText(title: string): string {
  return title.replace(/\[/g, '(').replace(/\]/g, ')').replace(/\s+/g, ' ').trim();
}

export function sourceLabel(item: ClassifiedItem): string {
  if (item.source === 'reddit' && item.community) return `r/${item.community}`;
  if (item.source === 'x' && item.author) return `@${item.author}`;
  return hostOf(item.url) ?? item.source;
}

export function itemLine(item: ClassifiedItem): string {
  const tag = item.topicSlug ? ` #${item.topicSlug}` : '';
  return `- [ ] [${linkText(item.title)}](${item.url}) — ${sourceLabel(item)}${tag}`;
}

function section(title: string, body: string[]): string[] {
  return body.length > 0 ? [`## ${title}`, '', ...body, ''] : [];
}

function mustFollowGroups(items: readonly ClassifiedItem[], config: PipelineConfig): string[] {
  const groupOf = new Map(config.mustFollow.map(a => [a.handle.toLowerCase(), a.group]));
  const groups = new Map<string, ClassifiedItem[]>();

  for (const item of items) {
    const group = (item.author && groupOf.get(item.author.toLowerCase())) || OTHER_GROUP;
    const list = groups.get(group) ?? [];
    list.push(item);
    groups.set(group, list);
  }

  const lines: string[] = [];
  for (const [group, groupItems] of groups) {
    lines.push(`### ${group}`, '');
    for (const item of groupItems) {
      const text = item.excerpt ?? item.title;
      const flat = linkText(text);
      const shown = flat.length > MUST_FOLLOW_TEXT_CHARS ? `${flat.slice(0, MUST_FOLLOW_TEXT_CHARS - 3)}...` : flat;
      const likes = item.engagement.likes;
      const suffix = likes !== undefined ? ` (${likes} likes)` : '';
      lines.push(`- [ ] [${shown}](${item.url}) — ${sourceLabel(item)}${suffix}`);
    }
    lines.push('');
  }
  return lines.slice(0, -1);
}

// ============================================================
// RENDER
// ============================================================

export function renderDailyNote(input: DailyNoteInput): string {
  const { date, digest, synthesis, config } = input;
  const { tags } = config;

  const lines: string[] = [
    '---',
    `date: ${date}`,
    'type: daily-research',
    `topics: [${config.topics.map(t => t.slug).join(', ')}]`,
    'status: unread',
    `reading_list: ${digest.readingList.length}`,
    `must_follow: ${digest.mustFollow.length}`,
    `deep_dives: ${digest.byCategory['deep-dive'].length}`,
    `lab_pulse: ${digest.byCategory['lab-pulse'].length}`,
    '---',
    '',
    `# Daily Research — ${formatDisplayDate(date)}`,
    '',
  ];

  lines.push(...section(HEADINGS.briefing, synthesis.briefing ? [synthesis.briefing] : []));
  lines.push(...section(HEADINGS.mustFollow, mustFollowGroups(digest.mustFollow, config)));

  const labItems = digest.byCategory['lab-pulse'].map(itemLine);
  const labBody = synthesis.labPulseSummary
    ? [synthesis.labPulseSummary, ...(labItems.length > 0 ? ['', ...labItems] : [])]
    : labItems;
  lines.push(...section(HEADINGS.labPulse, labBody));
  lines.push(...section(HEADINGS.deepDives, digest.byCategory['deep-dive'].map(itemLine)));
  lines.push(...section(HEADINGS.readingList, digest.byCategory.general.map(itemLine)));

  const bySlug = new Map(synthesis.topics.map(t => [t.slug, t]));
  for (const group of digest.byTopic) {
    const synth = bySlug.get(group.slug);
    const body: string[] = [];
    if (synth?.headline) body.push(`**${synth.headline}**`, '');
    if (synth && synth.keyPoints.length > 0) {
      body.push(...synth.keyPoints.map(point => `- ${point}`), '');
    }
    body.push(`*${group.items.length} new ${group.items.length === 1 ? 'item' : 'items'}*`);
    lines.push('---', '', ...section(group.displayName, body));
  }

  lines.push(
    '---',
    '',
    `## ${HEADINGS.promote}`,
    '',
    `> Add \`${tags.keep}\` to any item above to promote it to`,
    `> \`${config.run.libraryPath}/\` on the next run.`,
    '',
    `## ${HEADINGS.rate}`,
    '',
    `> Tag any item with \`${tags.good}\` or \`${tags.bad}\` to give feedback.`,
    ''
  );

  const feedback = input.feedback;
  if (feedback && (feedback.good > 0 || feedback.bad > 0)) {
    lines.push(
      `> Feedback processed this run: +${feedback.good} good, -${feedback.bad} bad ` +
        `(lifetime: ${feedback.lifetime.totalGood} good, ${feedback.lifetime.totalBad} bad)`,
      ''
    );
  }

  return lines.join('\n');
}
