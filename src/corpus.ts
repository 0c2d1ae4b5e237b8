/**
 * Corpus model — a directed link graph keyed by page identifier.
 *
 * Each page maps to the set of pages it links to. Link targets are
 * restricted to pages that are themselves in the corpus, and a page
 * never links to itself.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { CorpusValidationError } from './errors.js';
import { validateCorpus } from './validate.js';

export type Corpus = ReadonlyMap<string, ReadonlySet<string>>;

export type CorpusRecord = Record<string, string[]>;

const LINK_PATTERN = /<a\s+(?:[^>]*?)href="([^"]*)"/g;

export function pages(corpus: Corpus): string[] {
  return [...corpus.keys()];
}

/**
 * Extract every href target from an HTML document, in document order.
 */
export function extractLinks(html: string): string[] {
  const links: string[] = [];
  for (const match of html.matchAll(LINK_PATTERN)) {
    links.push(match[1]);
  }
  return links;
}

/**
 * Parse a directory of HTML pages into a corpus.
 *
 * Only `*.html` files directly inside `directory` become pages, visited in
 * sorted filename order so that page order is stable across platforms.
 * Links to files outside the corpus and links back to the same page are
 * dropped.
 */
export async function crawl(directory: string): Promise<Corpus> {
  const entries = await fs.readdir(directory, { withFileTypes: true });
  const filenames = entries
    .filter(e => e.isFile() && e.name.endsWith('.html'))
    .map(e => e.name)
    .sort();

  const raw = new Map<string, Set<string>>();
  for (const filename of filenames) {
    const contents = await fs.readFile(path.join(directory, filename), 'utf-8');
    const links = new Set(extractLinks(contents));
    links.delete(filename);
    raw.set(filename, links);
  }

  // Second pass: targets are only known once every file has been read
  const corpus = new Map<string, Set<string>>();
  for (const [page, links] of raw) {
    corpus.set(page, new Set([...links].filter(link => raw.has(link))));
  }

  return corpus;
}

/**
 * Build a corpus from its JSON form, an object mapping each page to its
 * list of links. Every own key is a page, `__proto__` included. The result
 * is validated, so a record with dangling links or self-loops is rejected
 * rather than repaired.
 */
export function corpusFromRecord(record: unknown): Corpus {
  if (typeof record !== 'object' || record === null || Array.isArray(record)) {
    throw new CorpusValidationError('Corpus must be an object mapping each page to its list of links');
  }

  const corpus = new Map<string, Set<unknown>>();
  for (const [page, links] of Object.entries(record)) {
    if (!Array.isArray(links)) {
      throw new CorpusValidationError(`Links of "${page}" must be a list`);
    }
    corpus.set(page, new Set<unknown>(links));
  }
  validateCorpus(corpus);
  return corpus;
}

export function corpusToRecord(corpus: Corpus): CorpusRecord {
  // fromEntries defines own properties, so a "__proto__" page survives
  return Object.fromEntries(
    pages(corpus).sort().map((page): [string, string[]] => [page, [...(corpus.get(page) ?? [])].sort()]),
  );
}
