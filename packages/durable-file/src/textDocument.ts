import path from 'node:path';

import { z } from 'zod';

import { AtomicWriteError, readFileIfExists, writeFileAtomic } from './atomicWrite';

const TextDocumentSchema = z.object({
  text: z.string(),
  savedAt: z.string(),
});

export type TextDocument = z.infer<typeof TextDocumentSchema>;

export async function saveTextDocument(filePath: string, text: string): Promise<TextDocument> {
  const document: TextDocument = { text, savedAt: new Date().toISOString() };
  await writeFileAtomic(filePath, `${JSON.stringify(document, null, 2)}\n`);
  return document;
}

export async function loadTextDocument(filePath: string): Promise<TextDocument | undefined> {
  const content = await readFileIfExists(filePath);
  if (content === undefined) {
    return undefined;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw new AtomicWriteError(path.resolve(filePath), 'parse', err);
  }
  const result = TextDocumentSchema.safeParse(parsed);
  if (!result.success) {
    throw new AtomicWriteError(path.resolve(filePath), 'parse', result.error);
  }
  return result.data;
}
