/**
 * Scanline — Corpus Module
 */

export type { Corpus } from './types';
export { FileSystemCorpus } from './filesystem';
export {
  markdownFormat,
  MalformedNoteError,
  type NoteFormat,
  type NoteLink,
  type TaggedLine,
} from './note-format';
