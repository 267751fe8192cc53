import type { DocumentSource } from '../types';

export const DOCUMENTS_ENDPOINT = '/api/documents';

export class DocumentLoadError extends Error {
  constructor(message: string, readonly status: number) {
    super(message);
    this.name = 'DocumentLoadError';
  }
}

interface DocumentResponse {
  document?: string;
  error?: string;
}

/** Asks the documents endpoint to extract the text of a source. */
export async function fetchDocument(source: DocumentSource, endpoint: string = DOCUMENTS_ENDPOINT): Promise<string> {
  const isUrl = 'url' in source;
  const response = await fetch(`${endpoint}?type=${encodeURIComponent(source.type)}`, {
    method: 'POST',
    headers: {
      'Content-Type': isUrl ? 'text/plain' : 'application/octet-stream',
    },
    body: 'url' in source ? source.url : source.file,
  });

  let payload: DocumentResponse = {};
  try {
    payload = await response.json();
  } catch (error) {
    console.error('Error reading documents response:', error);
  }

  if (!response.ok || typeof payload.document !== 'string') {
    throw new DocumentLoadError(
      payload.error || response.statusText || 'Failed to load document',
      response.status
    );
  }

  return payload.document;
}
