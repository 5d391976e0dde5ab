// pattern: Functional Core

export type { Note, RecallOptions, RecallOrder } from './types.js';
export { DEFAULT_NOTE_CATEGORY, NoteSchema, NoteDocumentSchema, NoteStoreError } from './types.js';
export type { NoteStore } from './store.js';
export { createFileNoteStore, type FileNoteStoreOptions } from './file-store.js';
