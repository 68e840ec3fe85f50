/**
 * Scanline — Synthesis
 *
 * Turns the final digest into prose sections for the daily note.
 * ClaudeSynthesizer asks the model for a JSON briefing; the extractive
 * synthesizer builds the same shape from titles alone and is used when
 * no API key is configured or the model call fails.
 */

import Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';
import type { ClassifiedItem, PipelineConfig } from '../types';
import type { Digest } from '../matching/ranker';
import { logger } from '../lib/logger';

// ============================================================
// TYPES
// ============================================================

export interface TopicSynthesis {
  slug: string;
  headline: string;
  keyPoints: string[];
}

export interface SynthesisSections {
  briefing: string;
  labPulseSummary: string;
  topics: TopicSynthesis[];
}

export interface SynthesisContext {
  /** YYYY-MM-DD */
  date: string;
}

export interface Synthesizer {
  readonly name: string;
  summarize(digest: Digest, context: SynthesisContext): Promise<SynthesisSections>;
}

const QUIET_TOPIC = 'Quiet day for this topic.';
const PROMPT_ITEMS_PER_TOPIC = 5;
const PROMPT_TEXT_CHARS = 160;

// ============================================================
// EXTRACTIVE
// ============================================================

export class ExtractiveSynthesizer implements Synthesizer {
  readonly name = 'extractive';

  async summarize(digest: Digest, _context: SynthesisContext): Promise<SynthesisSections> {
    const activeTopics = digest.byTopic.filter(t => t.items.length > 0);
    const top = digest.readingList[0];

    const briefing = top
      ? `${digest.readingList.length} new items across ${activeTopics.length} topics. ` +
        `Top of the list: ${top.title}.`
      : 'Nothing new today.';

    const labAuthors = [
      ...new Set(
        [...digest.byCategory['lab-pulse'], ...digest.mustFollow.filter(i => i.isLabAccount)]
          .map(i => i.author)
          .filter((a): a is string => !!a)
      ),
    ];
    const labPulseSummary =
      labAuthors.length > 0 ? `Posts from ${labAuthors.map(a => `@${a}`).join(', ')}.` : '';

    const topics = digest.byTopic.map(group => {
      const [first, ...rest] = group.items;
      return {
        slug: group.slug,
        headline: first ? first.title : QUIET_TOPIC,
        keyPoints: rest.slice(0, 3).map(i => i.title),
      };
    });

    return { briefing, labPulseSummary, topics };
  }
}

// ============================================================
// CLAUDE
// ============================================================

const SynthesisResponseSchema = z.object({
  briefing: z.string().default(''),
  lab_pulse_summary: z.string().default(''),
  topics: z
    .array(
      z.object({
        slug: z.string(),
        headline: z.string().default(''),
        key_points: z.array(z.string()).default([]),
      })
    )
    .default([]),
});

function clip(text: string, max: number): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > max ? `${flat.slice(0, max - 3)}...` : flat;
}

function describeItem(item: ClassifiedItem): string {
  const who = item.source === 'reddit' && item.community
    ? `r/${item.community}`
    : item.author
      ? `@${item.author}`
      : item.source;
  const metrics = Object.entries(item.engagement)
    .filter((entry): entry is [string, number] => entry[1] !== undefined)
    .map(([name, value]) => `${value} ${name}`)
    .join(', ');
  return `  - ${who}: "${clip(item.title, PROMPT_TEXT_CHARS)}"${metrics ? ` [${metrics}]` : ''}`;
}

export function buildSynthesisPrompt(digest: Digest, context: SynthesisContext): string {
  const sections = digest.byTopic.map(group => {
    const lines = group.items.slice(0, PROMPT_ITEMS_PER_TOPIC).map(describeItem);
    return `### ${group.displayName} (${group.slug})\n${lines.length > 0 ? lines.join('\n') : '(No new results)'}`;
  });

  const lab = digest.byCategory['lab-pulse'].map(describeItem);

  return `You are writing a DAILY morning research briefing for an AI practitioner.
DATE: ${context.date}

## SOURCE DATA
${sections.join('\n\n')}

### Lab posts
${lab.length > 0 ? lab.join('\n') : '(none)'}

## YOUR TASK
Respond with ONLY a JSON object:
{
  "briefing": "4-6 sentences on the most important developments today, leading with the single biggest story",
  "lab_pulse_summary": "2-3 sentences on what the model labs said or shipped today, or an empty string",
  "topics": [{ "slug": "topic-slug", "headline": "one sentence", "key_points": ["1-3 short, specific points"] }]
}
Use every topic slug above exactly once. For a topic with no results use the headline "${QUIET_TOPIC}".`;
}

export function parseSynthesisResponse(text: string): SynthesisSections {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    const fenced = text.match(/```(?:json)?\s*([\s\S]*?)\s*```/);
    if (!fenced) {
      throw new Error('Could not parse JSON from response');
    }
    json = JSON.parse(fenced[1]);
  }

  const parsed = SynthesisResponseSchema.parse(json);
  return {
    briefing: parsed.briefing,
    labPulseSummary: parsed.lab_pulse_summary,
    topics: parsed.topics.map(t => ({ slug: t.slug, headline: t.headline, keyPoints: t.key_points })),
  };
}

export interface ClaudeSynthesizerOptions {
  apiKey?: string;
  /** Injected client, mainly for tests */
  client?: Anthropic;
}

export class ClaudeSynthesizer implements Synthesizer {
  readonly name = 'claude';
  private client: Anthropic | null;
  private readonly log = logger.child({ component: 'ClaudeSynthesizer' });

  constructor(
    private readonly settings: PipelineConfig['synthesis'],
    private readonly options: ClaudeSynthesizerOptions = {}
  ) {
    this.client = options.client ?? null;
  }

  private getClient(): Anthropic {
    if (!this.client) {
      const apiKey = this.options.apiKey ?? process.env.ANTHROPIC_API_KEY;
      if (!apiKey) {
        throw new Error('ANTHROPIC_API_KEY not set');
      }
      this.client = new Anthropic({ apiKey });
    }
    return this.client;
  }

  async summarize(digest: Digest, context: SynthesisContext): Promise<SynthesisSections> {
    const client = this.getClient();

    const response = await client.messages.create({
      model: this.settings.model,
      max_tokens: this.settings.maxTokens,
      messages: [{ role: 'user', content: buildSynthesisPrompt(digest, context) }],
    });

    const textContent = response.content.find(c => c.type === 'text');
    if (!textContent || textContent.type !== 'text') {
      throw new Error('No text content in response');
    }

    const sections = parseSynthesisResponse(textContent.text);

    this.log.info('Synthesis completed', {
      model: this.settings.model,
      tokensUsed: response.usage.input_tokens + response.usage.output_tokens,
    });

    return sections;
  }
}

/**
 * Claude when a key is available, extractive otherwise.
 */
export function createSynthesizer(
  config: PipelineConfig,
  env: NodeJS.ProcessEnv = process.env
): Synthesizer {
  const apiKey = env.ANTHROPIC_API_KEY;
  if (!apiKey) {
    logger.info('ANTHROPIC_API_KEY not set; using extractive synthesis');
    return new ExtractiveSynthesizer();
  }
  return new ClaudeSynthesizer(config.synthesis, { apiKey });
}
