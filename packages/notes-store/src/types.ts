export type Note = {
  id: number;
  title: string;
  body: string;
  created_at: string; // ISO 8601
  updated_at: string; // ISO 8601
};

export type NoteInput = {
  title: string;
  body: string;
};
