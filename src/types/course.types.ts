/**
 * @fileoverview Course corpus model and the catalog boundary.
 *
 * The catalog stands in for the vector store; the orchestrator never sees
 * it directly, only through the course tools.
 *
 * @module rag-orchestrator/types/course
 * @version 0.1.0
 */

import { z } from 'zod';

export const LessonSchema = z.object({
  lessonNumber: z.number().int().nonnegative(),
  title: z.string().min(1),
  lessonLink: z.string().nullable().default(null),
});

export const CourseSchema = z.object({
  /** Full course title, unique across the catalog */
  title: z.string().min(1),
  courseLink: z.string().nullable().default(null),
  instructor: z.string().nullable().default(null),
  lessons: z.array(LessonSchema).default([]),
});

export const CourseChunkSchema = z.object({
  content: z.string(),
  courseTitle: z.string().min(1),
  lessonNumber: z.number().int().nonnegative().nullable().default(null),
  chunkIndex: z.number().int().nonnegative(),
});

export type Lesson = z.infer<typeof LessonSchema>;
export type Course = z.infer<typeof CourseSchema>;
export type CourseChunk = z.infer<typeof CourseChunkSchema>;

/**
 * Metadata stored alongside each searchable document.
 */
export interface ChunkMetadata {
  readonly courseTitle: string;
  readonly lessonNumber: number | null;
  readonly chunkIndex: number;
}

/**
 * Result of a catalog search. `documents[i]` pairs with `metadata[i]`.
 */
export interface SearchResults {
  readonly documents: ReadonlyArray<string>;
  readonly metadata: ReadonlyArray<ChunkMetadata>;
  readonly error: string | null;
}

export interface CourseSearchQuery {
  readonly query: string;
  readonly courseName?: string | undefined;
  readonly lessonNumber?: number | undefined;
}

/**
 * Read access to the course corpus.
 */
export interface CourseCatalog {
  search(query: CourseSearchQuery): Promise<SearchResults>;

  /** Maps a partial or approximate course name to a full title */
  resolveCourseName(name: string): Promise<string | null>;

  getCourse(title: string): Promise<Course | null>;

  getLessonLink(courseTitle: string, lessonNumber: number): Promise<string | null>;
}
