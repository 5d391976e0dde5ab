// pattern: Imperative Shell

/**
 * JSON-file NoteStore.
 * The whole collection is rewritten on every append: serialized to a temporary
 * file beside the target and renamed over it, so readers only ever see a fully
 * committed document. Appends on one store are serialized through a promise chain.
 */

import { randomUUID } from 'node:crypto';
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { basename, dirname, join, resolve } from 'node:path';
import type { NoteStore } from './store.js';
import {
  DEFAULT_NOTE_CATEGORY,
  NoteDocumentSchema,
  NoteStoreError,
  type Note,
  type RecallOptions,
} from './types.js';

export type FileNoteStoreOptions = {
  now?: () => Date;
};

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export function createFileNoteStore(
  path: string,
  options: FileNoteStoreOptions = {},
): NoteStore {
  const location = resolve(path);
  const now = options.now ?? (() => new Date());
  let writeChain: Promise<unknown> = Promise.resolve();

  async function load(): Promise<Array<Note>> {
    let raw: string;
    try {
      raw = await readFile(location, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw new NoteStoreError(location, `failed to read notes: ${String(error)}`, { cause: error });
    }

    if (raw.trim() === '') {
      return [];
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new NoteStoreError(location, `notes file is not valid JSON: ${location}`, { cause: error });
    }

    const result = NoteDocumentSchema.safeParse(parsed);
    if (!result.success) {
      throw new NoteStoreError(
        location,
        `notes file has an unexpected shape: ${result.error.issues[0]?.message ?? 'invalid document'}`,
      );
    }
    return result.data;
  }

  async function commit(notes: ReadonlyArray<Note>): Promise<void> {
    const dir = dirname(location);
    await mkdir(dir, { recursive: true });

    const tempPath = join(dir, `.${basename(location)}.${process.pid}.${randomUUID()}.tmp`);
    try {
      await writeFile(tempPath, JSON.stringify(notes, null, 2), 'utf-8');
      await rename(tempPath, location);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw new NoteStoreError(location, `failed to write notes: ${String(error)}`, { cause: error });
    }
  }

  function serialized<T>(task: () => Promise<T>): Promise<T> {
    const run = writeChain.then(task, task);
    // keep the chain alive after a failed write
    writeChain = run.catch(() => undefined);
    return run;
  }

  return {
    location,

    record(content: string, category: string = DEFAULT_NOTE_CATEGORY): Promise<Note> {
      return serialized(async () => {
        const notes = await load();
        const note: Note = {
          timestamp: now().toISOString(),
          category,
          content,
        };
        notes.push(note);
        await commit(notes);
        return note;
      });
    },

    async recall(recallOptions: RecallOptions = {}): Promise<Array<Note>> {
      const notes = await load();
      const filtered = recallOptions.category === undefined
        ? notes
        : notes.filter((note) => note.category === recallOptions.category);

      return recallOptions.order === 'newest_first' ? filtered.reverse() : filtered;
    },
  };
}
