/**
 * Scanline — Delivery Module
 *
 * Synthesis and the Markdown notes written back to the vault.
 */

export {
  ClaudeSynthesizer,
  ExtractiveSynthesizer,
  buildSynthesisPrompt,
  createSynthesizer,
  parseSynthesisResponse,
  type ClaudeSynthesizerOptions,
  type SynthesisContext,
  type SynthesisSections,
  type Synthesizer,
  type TopicSynthesis,
} from './synthesis';

export {
  dailyNotePath,
  formatDisplayDate,
  noteHeadings,
  itemLine,
  linkText,
  renderDailyNote,
  sourceLabel,
  type DailyNoteInput,
} from './daily-note';

export {
  renderLibraryNote,
  slugify,
  uniqueNotePath,
  type LibraryEntry,
} from './library-note';
