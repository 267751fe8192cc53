import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { JSDOM } from 'jsdom';
import Papa from 'papaparse';
import { YoutubeTranscript } from 'youtube-transcript';
import { isSourceType, type SourceType } from '../types';
import { loadConfig, type LoaderConfig } from './config';

export const FRAGMENT_SEPARATOR = '\n\n';

export class UnsupportedSourceTypeError extends Error {
  constructor(type: string) {
    super(`Unsupported source type: ${type}`);
    this.name = 'UnsupportedSourceTypeError';
  }
}

export class SourceMismatchError extends Error {
  constructor(type: SourceType, expected: 'a URL' | 'file contents') {
    super(`${type} sources take ${expected}`);
    this.name = 'SourceMismatchError';
  }
}

interface UrlLoader {
  kind: 'url';
  load(url: string, config: LoaderConfig): Promise<string[]>;
}

interface FileLoader {
  kind: 'file';
  suffix: string;
  load(filePath: string, config: LoaderConfig): Promise<string[]>;
}

type SourceLoader = UrlLoader | FileLoader;

// ── Extraction routines ───────────────────────────────────────────

async function loadWebsite(url: string, config: LoaderConfig): Promise<string[]> {
  const response = await fetch(url, { headers: { 'User-Agent': config.userAgent } });
  if (!response.ok) {
    throw new Error(`Failed to fetch ${url}: ${response.status} ${response.statusText}`);
  }

  const dom = new JSDOM(await response.text());
  const { document } = dom.window;
  document.querySelectorAll('script, style, template').forEach((element) => element.remove());
  return [document.documentElement.textContent ?? ''];
}

async function loadYoutube(url: string, config: LoaderConfig): Promise<string[]> {
  const transcript = await YoutubeTranscript.fetchTranscript(url, { lang: config.transcriptLanguage });
  return [transcript.map((part) => part.text).join(' ')];
}

async function loadPdf(filePath: string): Promise<string[]> {
  const { PDFParse } = await import('pdf-parse');
  const parser = new PDFParse({ data: await fs.readFile(filePath) });
  try {
    const result = await parser.getText();
    return result.pages.map((page) => page.text);
  } finally {
    await parser.destroy().catch(() => undefined);
  }
}

async function loadCsv(filePath: string): Promise<string[]> {
  const text = await fs.readFile(filePath, 'utf-8');
  const { data, meta } = Papa.parse<Record<string, unknown>>(text, {
    header: true,
    skipEmptyLines: true,
  });
  const columns = meta.fields ?? [];

  return data.map((row) =>
    columns
      .map((column) => {
        const value = row[column];
        return `${column.trim()}: ${typeof value === 'string' ? value.trim() : ''}`;
      })
      .join('\n')
  );
}

async function loadTxt(filePath: string): Promise<string[]> {
  return [await fs.readFile(filePath, 'utf-8')];
}

export const LOADERS: Record<SourceType, SourceLoader> = {
  Website: { kind: 'url', load: loadWebsite },
  Youtube: { kind: 'url', load: loadYoutube },
  Pdf: { kind: 'file', suffix: '.pdf', load: loadPdf },
  Csv: { kind: 'file', suffix: '.csv', load: loadCsv },
  Txt: { kind: 'file', suffix: '.txt', load: loadTxt },
};

// ── Temp files ────────────────────────────────────────────────────

/** Writes `data` to a fresh temp file that only lives for the duration of `fn`. */
export async function withTempFile<T>(
  data: Uint8Array,
  suffix: string,
  fn: (filePath: string) => Promise<T>
): Promise<T> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'oracle-'));
  try {
    const filePath = path.join(dir, `upload${suffix}`);
    await fs.writeFile(filePath, data);
    return await fn(filePath);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}

// ── Entry point ───────────────────────────────────────────────────

/**
 * Extracts the text of a source as one string, with the fragments the
 * underlying extractor returned (pages, rows, transcripts) separated by a
 * blank line.
 *
 * `source` is a URL for Website and Youtube, and the uploaded bytes for the
 * file types.
 */
export async function loadDocument(
  type: string,
  source: string | Uint8Array,
  config: LoaderConfig = loadConfig()
): Promise<string> {
  if (!isSourceType(type)) {
    throw new UnsupportedSourceTypeError(type);
  }
  const loader = LOADERS[type];
  let fragments: string[];

  if (loader.kind === 'url') {
    if (typeof source !== 'string') throw new SourceMismatchError(type, 'a URL');
    fragments = await loader.load(source, config);
  } else {
    if (typeof source === 'string') throw new SourceMismatchError(type, 'file contents');
    fragments = await withTempFile(source, loader.suffix, (filePath) => loader.load(filePath, config));
  }

  return fragments.join(FRAGMENT_SEPARATOR);
}
