// pattern: Imperative Shell

/**
 * Built-in session note tools.
 * These tools are the only way the agent reaches the NoteStore; they go through
 * the ordinary registry dispatch like any other tool.
 */

import { DEFAULT_NOTE_CATEGORY, type Note, type NoteStore, type RecallOrder } from '../../memory/index.js';
import { optionalString, requireString } from '../input.js';
import { errorMessage, toolFailure, toolSuccess } from '../result.js';
import type { Tool } from '../types.js';

function toRecallOrder(value: string | undefined): RecallOrder | undefined {
  if (value === 'oldest_first' || value === 'newest_first') {
    return value;
  }
  return undefined;
}

export function formatNotes(notes: ReadonlyArray<Note>): string {
  const lines = notes.map(
    (note, index) => `${index + 1}. [${note.category}] ${note.content}\n   (recorded at ${note.timestamp})`,
  );
  return `Recorded Notes:\n${lines.join('\n')}`;
}

export function createNoteTools(store: NoteStore): Array<Tool> {
  const record_note: Tool = {
    definition: {
      name: 'record_note',
      description:
        'Record important information as session notes for future reference. Use this to record key facts, user preferences, decisions, or context that should be recalled later, including in future sessions. Each note is timestamped.',
      parameters: [
        {
          name: 'content',
          type: 'string',
          description: 'The information to record as a note. Be concise but specific.',
          required: true,
        },
        {
          name: 'category',
          type: 'string',
          description: "Category for this note (e.g., 'user_preference', 'project_info', 'decision')",
          required: false,
          default: DEFAULT_NOTE_CATEGORY,
        },
      ],
    },
    execute: async (input) => {
      try {
        const content = requireString(input, 'content');
        const category = optionalString(input, 'category') ?? DEFAULT_NOTE_CATEGORY;

        await store.record(content, category);

        return toolSuccess(`Recorded note: ${content} (category: ${category})`);
      } catch (error) {
        return toolFailure(`Failed to record note: ${errorMessage(error)}`);
      }
    },
  };

  const recall_notes: Tool = {
    definition: {
      name: 'recall_notes',
      description:
        'Recall previously recorded session notes, optionally filtered by category. Use this to retrieve facts, context, or decisions from earlier in this session or from previous sessions.',
      parameters: [
        {
          name: 'category',
          type: 'string',
          description: 'Only return notes in this category',
          required: false,
        },
        {
          name: 'order',
          type: 'string',
          description: 'Return notes oldest first (default) or newest first',
          required: false,
          enum_values: ['oldest_first', 'newest_first'],
        },
      ],
    },
    execute: async (input) => {
      try {
        const category = optionalString(input, 'category');
        const order = toRecallOrder(optionalString(input, 'order'));

        const notes = await store.recall({ category, order });

        if (notes.length === 0) {
          return toolSuccess(category ? `No notes found in category: ${category}` : 'No notes recorded yet.');
        }

        return toolSuccess(formatNotes(notes));
      } catch (error) {
        return toolFailure(`Failed to recall notes: ${errorMessage(error)}`);
      }
    },
  };

  return [record_note, recall_notes];
}
