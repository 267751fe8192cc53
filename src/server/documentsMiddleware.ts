import type { Plugin } from 'vite';
import { isSourceType, isUrlSourceType } from '../types';
import { loadConfig, type LoaderConfig } from './config';
import { loadDocument } from './loaders';

export const DOCUMENTS_PATH = '/api/documents';

/** The parts of `IncomingMessage` the handler reads. */
export interface DocumentRequest extends AsyncIterable<Uint8Array> {
  url?: string;
  method?: string;
}

/** The parts of `ServerResponse` the handler writes. */
export interface DocumentResponse {
  statusCode: number;
  setHeader(name: string, value: string): unknown;
  end(body: string): unknown;
}

type LoadDocument = (type: string, source: string | Uint8Array, config: LoaderConfig) => Promise<string>;

async function readBody(req: DocumentRequest): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.from(chunk));
  }
  return Buffer.concat(chunks);
}

function sendJson(res: DocumentResponse, status: number, payload: { document: string } | { error: string }): void {
  res.statusCode = status;
  res.setHeader('Content-Type', 'application/json');
  res.end(JSON.stringify(payload));
}

function extractErrorMessage(error: unknown): string {
  if (error instanceof Error && error.message.trim().length > 0) {
    return error.message;
  }
  return 'Unable to load document.';
}

export function createDocumentsHandler(
  config: LoaderConfig = loadConfig(),
  load: LoadDocument = loadDocument
) {
  return async (req: DocumentRequest, res: DocumentResponse, next: () => void): Promise<void> => {
    if (req.method !== 'POST') {
      next();
      return;
    }

    const type = new URL(req.url ?? '/', 'http://localhost').searchParams.get('type') ?? '';
    if (!isSourceType(type)) {
      sendJson(res, 400, { error: `Unsupported source type: ${type}` });
      return;
    }

    const body = await readBody(req);
    let source: string | Uint8Array;
    if (isUrlSourceType(type)) {
      source = body.toString('utf-8').trim();
      if (!source) {
        sendJson(res, 400, { error: `A URL is required for ${type} sources` });
        return;
      }
    } else {
      if (body.length === 0) {
        sendJson(res, 400, { error: `An uploaded file is required for ${type} sources` });
        return;
      }
      source = body;
    }

    try {
      const document = await load(type, source, config);
      console.info(`[oracle] loaded ${type} document (${document.length} chars)`);
      sendJson(res, 200, { document });
    } catch (error) {
      console.error(`[oracle] failed to load ${type} document:`, error);
      sendJson(res, 500, { error: extractErrorMessage(error) });
    }
  };
}

/** Serves {@link DOCUMENTS_PATH} from both the dev server and `vite preview`. */
export function documentsPlugin(): Plugin {
  return {
    name: 'oracle-documents',
    configureServer(server) {
      const handle = createDocumentsHandler();
      server.middlewares.use(DOCUMENTS_PATH, (req, res, next) => {
        handle(req, res, next).catch(next);
      });
    },
    configurePreviewServer(server) {
      const handle = createDocumentsHandler();
      server.middlewares.use(DOCUMENTS_PATH, (req, res, next) => {
        handle(req, res, next).catch(next);
      });
    },
  };
}
