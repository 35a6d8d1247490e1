/**
 * @fileoverview Course retrieval tools offered to the model.
 *
 * Both tools read the corpus through a `CourseCatalog`, so any vector store
 * (or the in-memory catalog) can back them.
 *
 * @module rag-orchestrator/tools/course-tools
 * @version 0.1.0
 */

import { z } from 'zod';
import type { CourseCatalog, SearchResults } from '../types/course.types.js';
import type { SourceReference, ToolDefinition, ToolOutput } from '../types/tools.types.js';
import { ErrorCode, ToolExecutionError } from '../utils/errors.js';

export const SEARCH_TOOL_NAME = 'search_course_content';
export const OUTLINE_TOOL_NAME = 'get_course_outline';

// ============ Input Schemas ============

const CourseSearchInputSchema = z.object({
  query: z.string().min(1).describe('What to search for in the course content'),
  course_name: z
    .string()
    .optional()
    .describe("Course title (partial matches work, e.g. 'MCP', 'Introduction')"),
  lesson_number: z
    .number()
    .int()
    .nonnegative()
    .optional()
    .describe('Specific lesson number to search within (e.g. 1, 2, 3)'),
});

const CourseOutlineInputSchema = z.object({
  course_title: z
    .string()
    .min(1)
    .describe("Course title (partial matches work, e.g. 'MCP', 'Introduction')"),
});

// ============ Tool Definitions ============

export function createCourseSearchTool(
  catalog: CourseCatalog,
): ToolDefinition<typeof CourseSearchInputSchema> {
  return {
    name: SEARCH_TOOL_NAME,
    description:
      'Search course materials with smart course name matching and lesson filtering.',
    inputSchema: CourseSearchInputSchema,
    execute: async (input) => {
      const results = await catalog.search({
        query: input.query,
        courseName: input.course_name,
        lessonNumber: input.lesson_number,
      });

      if (results.error !== null) {
        throw new ToolExecutionError(ErrorCode.SEARCH_FAILED, results.error, SEARCH_TOOL_NAME);
      }

      if (results.documents.length === 0) {
        let filterInfo = '';
        if (input.course_name !== undefined) filterInfo += ` in course '${input.course_name}'`;
        if (input.lesson_number !== undefined) filterInfo += ` in lesson ${input.lesson_number}`;
        return `No relevant content found${filterInfo}.`;
      }

      return formatResults(catalog, results);
    },
  };
}

export function createCourseOutlineTool(
  catalog: CourseCatalog,
): ToolDefinition<typeof CourseOutlineInputSchema> {
  return {
    name: OUTLINE_TOOL_NAME,
    description:
      'Get the course outline, syllabus, or lesson list for a specific course. Returns course title, ' +
      'course link, instructor, and complete lesson list with lesson numbers and titles.',
    inputSchema: CourseOutlineInputSchema,
    execute: async (input): Promise<ToolOutput> => {
      const title = await catalog.resolveCourseName(input.course_title);
      if (title === null) {
        return `Course '${input.course_title}' not found.`;
      }

      const course = await catalog.getCourse(title);
      if (course === null) {
        return `Could not retrieve outline for '${title}'.`;
      }

      let outline = `## Course Outline: ${course.title}\n\n`;
      if (course.instructor !== null) {
        outline += `**Instructor:** ${course.instructor}\n\n`;
      }

      if (course.lessons.length > 0) {
        outline += '**Lessons:**\n\n';
        for (const lesson of course.lessons) {
          outline += `- **Lesson ${lesson.lessonNumber}:** ${lesson.title}\n`;
        }
        outline += `\n**Total:** ${course.lessons.length} lessons\n`;
      } else {
        outline += 'No lesson information available.\n';
      }

      if (course.courseLink !== null) {
        outline += `\n**Course Link:** ${course.courseLink}\n`;
      }

      const sources = course.lessons.length > 0
        ? [{ label: course.title, link: course.courseLink }]
        : [];
      return { text: outline, sources };
    },
  };
}

/**
 * Both course tools, search first.
 */
export function createCourseTools(catalog: CourseCatalog): ToolDefinition[] {
  return [createCourseSearchTool(catalog), createCourseOutlineTool(catalog)];
}

// ============ Helpers ============

async function formatResults(catalog: CourseCatalog, results: SearchResults): Promise<ToolOutput> {
  const blocks: string[] = [];
  const sources: SourceReference[] = [];
  const seen = new Set<string>();

  for (const [index, document] of results.documents.entries()) {
    const meta = results.metadata[index];
    const courseTitle = meta?.courseTitle ?? 'unknown';
    const lessonNumber = meta?.lessonNumber ?? null;

    const label = lessonNumber !== null ? `${courseTitle} - Lesson ${lessonNumber}` : courseTitle;
    blocks.push(`[${label}]\n${document}`);

    if (!seen.has(label)) {
      seen.add(label);
      const link = lessonNumber !== null
        ? await catalog.getLessonLink(courseTitle, lessonNumber)
        : null;
      sources.push({ label, link });
    }
  }

  return { text: blocks.join('\n\n'), sources };
}
