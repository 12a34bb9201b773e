import type { Note } from '@notekeep/notes-store';

export function formatNote(note: Note): string[] {
  const header = `#${note.id}  ${note.title}  (${note.created_at})`;
  return [header, ...note.body.split('\n').map((line) => `    ${line}`)];
}

export function formatNoteList(notes: readonly Note[]): string[] {
  if (notes.length === 0) {
    return ['No notes yet.'];
  }
  return notes.flatMap((note) => formatNote(note));
}
