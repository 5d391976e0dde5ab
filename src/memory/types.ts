// pattern: Functional Core

/**
 * Session memory types.
 * Notes are append-only records that survive across agent runs.
 */

import { z } from 'zod';

export const DEFAULT_NOTE_CATEGORY = 'general';

export type Note = {
  readonly content: string;
  readonly category: string;
  /** ISO-8601 creation time. */
  readonly timestamp: string;
};

export type RecallOrder = 'oldest_first' | 'newest_first';

export type RecallOptions = {
  category?: string;
  order?: RecallOrder;
};

// unknown keys are dropped so documents written by newer versions still load
export const NoteSchema = z.object({
  content: z.string(),
  category: z.string().default(DEFAULT_NOTE_CATEGORY),
  timestamp: z.string(),
});

export const NoteDocumentSchema = z.array(NoteSchema);

export class NoteStoreError extends Error {
  constructor(
    public path: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'NoteStoreError';
  }
}
