import { isStorageError, ValidationError } from './errors';
import { MAX_NOTE_BODY_LENGTH } from './limits';

const TECHNICAL_ERROR_MESSAGE = 'Something went wrong while saving your notes. Please try again.';

/**
 * Turns any thrown value into the text shown to a person. Validation and
 * missing-record failures get corrective guidance; everything else is opaque.
 */
export function describeFailure(error: unknown): string {
  if (error instanceof ValidationError) {
    if (error.reason === 'too_long') {
      return `Note must be at most ${MAX_NOTE_BODY_LENGTH} characters.`;
    }
    if (error.reason === 'invalid_text') {
      return 'Title and note contain characters that cannot be saved.';
    }
    return 'Title and note cannot be empty.';
  }
  if (isStorageError(error) && error.kind === 'NotFound') {
    return error.message;
  }
  return TECHNICAL_ERROR_MESSAGE;
}

export function describeErrorForLog(error: unknown): string {
  if (isStorageError(error)) {
    const cause = error.cause instanceof Error ? ` (cause: ${error.cause.message})` : '';
    return `${error.kind}: ${error.message}${cause}`;
  }
  return error instanceof Error ? error.message : String(error);
}
