/**
 * Async-local context for document-scoped metadata (the email being cleaned).
 */
import { AsyncLocalStorage } from 'async_hooks';

type DocumentContext = {
  file?: string;
};

const storage = new AsyncLocalStorage<DocumentContext>();

export function runWithDocument<T>(ctx: DocumentContext, fn: () => T): T {
  return storage.run(ctx, fn);
}

export function getDocumentContext(): DocumentContext | undefined {
  return storage.getStore();
}
