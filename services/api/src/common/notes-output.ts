/**
 * Receives the human-readable progress notes of an update run.
 */
export interface NotesOutput {
  write(line: string): void;
}

/** Keeps notes in memory so an HTTP call can return them */
export class MemoryNotesOutput implements NotesOutput {
  readonly lines: string[] = [];

  write(line: string): void {
    this.lines.push(line);
  }
}
