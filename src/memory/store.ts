// pattern: Functional Core

/**
 * NoteStore port interface.
 * This is the abstraction boundary for session memory persistence.
 */

import type { Note, RecallOptions } from './types.js';

export interface NoteStore {
  readonly location: string;
  record(content: string, category?: string): Promise<Note>;
  recall(options?: RecallOptions): Promise<Array<Note>>;
}
