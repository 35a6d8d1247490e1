/**
 * @fileoverview In-memory course catalog.
 *
 * Scores chunks by how many distinct query terms they contain. Good enough
 * to drive the CLI and tests; a vector store plugs in behind the same
 * `CourseCatalog` interface.
 *
 * @module rag-orchestrator/catalog/in-memory-catalog
 * @version 0.1.0
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import {
  CourseChunkSchema,
  CourseSchema,
  type ChunkMetadata,
  type Course,
  type CourseCatalog,
  type CourseChunk,
  type CourseSearchQuery,
  type SearchResults,
} from '../types/course.types.js';
import { ConfigurationError, errorMessage } from '../utils/errors.js';

export const CatalogDataSchema = z.object({
  courses: z.array(CourseSchema),
  chunks: z.array(CourseChunkSchema).default([]),
});

export type CatalogData = z.infer<typeof CatalogDataSchema>;

export interface InMemoryCatalogOptions {
  /** Upper bound on documents returned per search */
  readonly maxResults: number;
}

const DEFAULT_OPTIONS: InMemoryCatalogOptions = {
  maxResults: 5,
};

interface IndexedChunk {
  readonly chunk: CourseChunk;
  readonly terms: ReadonlySet<string>;
}

export class InMemoryCourseCatalog implements CourseCatalog {
  private readonly courses: Map<string, Course> = new Map();
  private readonly chunks: ReadonlyArray<IndexedChunk>;
  private readonly options: InMemoryCatalogOptions;

  constructor(data: CatalogData, options: Partial<InMemoryCatalogOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    for (const course of data.courses) {
      this.courses.set(course.title, course);
    }
    this.chunks = data.chunks.map(chunk => ({ chunk, terms: new Set(tokenize(chunk.content)) }));
  }

  /**
   * Validates raw catalog data (e.g. parsed JSON).
   *
   * @throws ConfigurationError listing every schema violation
   */
  static fromData(raw: unknown, options?: Partial<InMemoryCatalogOptions>): InMemoryCourseCatalog {
    const parsed = CatalogDataSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigurationError(`Invalid catalog data: ${issues.join('; ')}`, issues);
    }
    return new InMemoryCourseCatalog(parsed.data, options);
  }

  /**
   * Loads a JSON document `{ courses, chunks }`.
   */
  static async fromFile(path: string, options?: Partial<InMemoryCatalogOptions>): Promise<InMemoryCourseCatalog> {
    const text = await readFile(path, 'utf8');
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new ConfigurationError(`Catalog file ${path} is not valid JSON`, [errorMessage(error)]);
    }
    return InMemoryCourseCatalog.fromData(raw, options);
  }

  get courseCount(): number {
    return this.courses.size;
  }

  get chunkCount(): number {
    return this.chunks.length;
  }

  async search(query: CourseSearchQuery): Promise<SearchResults> {
    let courseTitle: string | null = null;
    if (query.courseName !== undefined) {
      courseTitle = await this.resolveCourseName(query.courseName);
      if (courseTitle === null) {
        return { documents: [], metadata: [], error: `No course found matching '${query.courseName}'` };
      }
    }

    const queryTerms = new Set(tokenize(query.query));
    const scored: Array<{ chunk: CourseChunk; score: number }> = [];

    for (const { chunk, terms } of this.chunks) {
      if (courseTitle !== null && chunk.courseTitle !== courseTitle) continue;
      if (query.lessonNumber !== undefined && chunk.lessonNumber !== query.lessonNumber) continue;

      let score = 0;
      for (const term of queryTerms) {
        if (terms.has(term)) score++;
      }
      if (score > 0) scored.push({ chunk, score });
    }

    // Array.prototype.sort is stable, so equal keys keep corpus order
    scored.sort((a, b) => b.score - a.score || a.chunk.chunkIndex - b.chunk.chunkIndex);
    const top = scored.slice(0, this.options.maxResults);

    return {
      documents: top.map(({ chunk }) => chunk.content),
      metadata: top.map(({ chunk }): ChunkMetadata => ({
        courseTitle: chunk.courseTitle,
        lessonNumber: chunk.lessonNumber,
        chunkIndex: chunk.chunkIndex,
      })),
      error: null,
    };
  }

  async resolveCourseName(name: string): Promise<string | null> {
    const needle = name.trim().toLowerCase();
    if (needle.length === 0) return null;

    const titles = Array.from(this.courses.keys());
    const exact = titles.find(title => title.toLowerCase() === needle);
    if (exact !== undefined) return exact;

    return titles.find(title => title.toLowerCase().includes(needle)) ?? null;
  }

  async getCourse(title: string): Promise<Course | null> {
    return this.courses.get(title) ?? null;
  }

  async getLessonLink(courseTitle: string, lessonNumber: number): Promise<string | null> {
    const lesson = this.courses.get(courseTitle)?.lessons.find(l => l.lessonNumber === lessonNumber);
    return lesson?.lessonLink ?? null;
  }
}

const WORD_PATTERN = /[\p{L}\p{N}]+/gu;
const HAN_RUN_PATTERN = /(\p{Script=Han}+)/u;
const HAN_ONLY_PATTERN = /^\p{Script=Han}+$/u;

/**
 * Lowercased letter and digit runs. Han text has no word breaks, so its runs
 * are indexed as character bigrams (a lone character stays a term).
 */
export function tokenize(text: string): string[] {
  const terms: string[] = [];
  for (const word of text.toLowerCase().match(WORD_PATTERN) ?? []) {
    for (const part of word.split(HAN_RUN_PATTERN)) {
      if (part.length === 0) continue;
      if (HAN_ONLY_PATTERN.test(part)) {
        terms.push(...hanBigrams(part));
      } else {
        terms.push(part);
      }
    }
  }
  return terms;
}

function hanBigrams(run: string): string[] {
  const chars = Array.from(run);
  if (chars.length === 1) return chars;
  const bigrams: string[] = [];
  for (let i = 0; i < chars.length - 1; i++) {
    bigrams.push(`${chars[i] ?? ''}${chars[i + 1] ?? ''}`);
  }
  return bigrams;
}
