/**
 * Scanline — Corpus Collaborator
 *
 * The note vault is only touched through this interface. Paths are
 * vault-relative and use forward slashes; line numbers are zero-based.
 */

export interface Corpus {
  /** Where the corpus lives, for diagnostics */
  readonly location: string;

  /**
   * List note paths under a folder, recursively, sorted.
   * A missing folder is empty; an unreachable corpus throws CorpusUnavailableError.
   */
  listNotes(pathPrefix: string): Promise<string[]>;

  read(notePath: string): Promise<string>;

  /**
   * Replace a single line. When `expected` is given the write only happens
   * if the line still reads exactly that. Returns false on any failure.
   */
  rewriteLine(
    notePath: string,
    lineNumber: number,
    newText: string,
    expected?: string
  ): Promise<boolean>;

  /** Create a new note. Returns false if it already exists or cannot be written. */
  create(notePath: string, content: string): Promise<boolean>;

  exists(notePath: string): Promise<boolean>;
}
