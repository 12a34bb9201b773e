export { AtomicWriteError, readFileIfExists, writeFileAtomic } from './atomicWrite';
export type { AtomicWriteStep } from './atomicWrite';
export { loadTextDocument, saveTextDocument } from './textDocument';
export type { TextDocument } from './textDocument';
