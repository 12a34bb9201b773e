/** Upper bound on a note body, counted in Unicode code points. */
export const MAX_NOTE_BODY_LENGTH = 2000;
