/**
 * @fileoverview Unit tests for InMemoryCourseCatalog
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { InMemoryCourseCatalog, tokenize } from './in-memory-catalog.js';
import { ConfigurationError } from '../utils/errors.js';

const data = {
  courses: [
    {
      title: 'Intro to MCP',
      courseLink: 'https://example.com/intro',
      instructor: 'Lee Sample',
      lessons: [
        { lessonNumber: 1, title: 'Basics', lessonLink: 'https://example.com/intro/1' },
        { lessonNumber: 2, title: 'Servers', lessonLink: 'https://example.com/intro/2' },
      ],
    },
    {
      title: 'Advanced MCP Servers',
      courseLink: null,
      lessons: [{ lessonNumber: 1, title: 'Streaming' }],
    },
  ],
  chunks: [
    { courseTitle: 'Intro to MCP', lessonNumber: 1, chunkIndex: 0, content: 'MCP connects models to tools' },
    { courseTitle: 'Intro to MCP', lessonNumber: 2, chunkIndex: 1, content: 'Servers expose tools and resources' },
    { courseTitle: 'Advanced MCP Servers', lessonNumber: 1, chunkIndex: 0, content: 'Advanced servers stream resources to clients' },
    { courseTitle: 'Intro to MCP', chunkIndex: 2, content: 'Course overview of MCP servers' },
  ],
};

describe('InMemoryCourseCatalog', () => {
  let catalog: InMemoryCourseCatalog;

  beforeEach(() => {
    catalog = InMemoryCourseCatalog.fromData(data);
  });

  describe('fromData()', () => {
    it('should apply schema defaults', async () => {
      expect(catalog.courseCount).toBe(2);
      expect(catalog.chunkCount).toBe(4);

      const advanced = await catalog.getCourse('Advanced MCP Servers');
      expect(advanced?.instructor).toBeNull();
      expect(advanced?.lessons[0]?.lessonLink).toBeNull();
    });

    it('should reject invalid data', () => {
      expect(() => InMemoryCourseCatalog.fromData({ courses: [{ title: '' }] })).toThrow(ConfigurationError);
      expect(() => InMemoryCourseCatalog.fromData('not a catalog')).toThrow(ConfigurationError);
    });
  });

  describe('resolveCourseName()', () => {
    it('should prefer an exact case-insensitive match', async () => {
      await expect(catalog.resolveCourseName('advanced mcp servers')).resolves.toBe('Advanced MCP Servers');
    });

    it('should fall back to the first title containing the name', async () => {
      await expect(catalog.resolveCourseName('MCP')).resolves.toBe('Intro to MCP');
      await expect(catalog.resolveCourseName('advanced')).resolves.toBe('Advanced MCP Servers');
    });

    it('should return null for blank or unknown names', async () => {
      await expect(catalog.resolveCourseName('   ')).resolves.toBeNull();
      await expect(catalog.resolveCourseName('Rust')).resolves.toBeNull();
    });
  });

  describe('search()', () => {
    it('should rank by matching terms, then chunk index', async () => {
      const results = await catalog.search({ query: 'MCP servers' });

      expect(results.error).toBeNull();
      expect(results.documents).toEqual([
        'Course overview of MCP servers',
        'MCP connects models to tools',
        'Advanced servers stream resources to clients',
        'Servers expose tools and resources',
      ]);
      expect(results.metadata[0]).toEqual({ courseTitle: 'Intro to MCP', lessonNumber: null, chunkIndex: 2 });
    });

    it('should cap results at maxResults', async () => {
      const small = InMemoryCourseCatalog.fromData(data, { maxResults: 2 });

      const results = await small.search({ query: 'MCP servers' });

      expect(results.documents).toEqual(['Course overview of MCP servers', 'MCP connects models to tools']);
    });

    it('should filter by resolved course and lesson', async () => {
      const byCourse = await catalog.search({ query: 'mcp servers', courseName: 'intro' });
      expect(byCourse.documents).toEqual([
        'Course overview of MCP servers',
        'MCP connects models to tools',
        'Servers expose tools and resources',
      ]);

      const byLesson = await catalog.search({ query: 'mcp servers', courseName: 'intro', lessonNumber: 2 });
      expect(byLesson.documents).toEqual(['Servers expose tools and resources']);
    });

    it('should drop chunks that share no terms with the query', async () => {
      const results = await catalog.search({ query: 'quantum' });
      expect(results).toEqual({ documents: [], metadata: [], error: null });
    });

    it('should report an unknown course as an error', async () => {
      const results = await catalog.search({ query: 'anything', courseName: 'Rust' });
      expect(results).toEqual({ documents: [], metadata: [], error: "No course found matching 'Rust'" });
    });
  });

  describe('non-ASCII text', () => {
    const multilingual = InMemoryCourseCatalog.fromData({
      courses: [{ title: 'Search Basics', lessons: [] }],
      chunks: [
        { courseTitle: 'Search Basics', chunkIndex: 0, content: 'résumé writing and 向量检索 basics' },
        { courseTitle: 'Search Basics', chunkIndex: 1, content: 'sum of r values' },
      ],
    });

    it('should keep accented words whole', async () => {
      const results = await multilingual.search({ query: 'résumé' });
      expect(results.documents).toEqual(['résumé writing and 向量检索 basics']);
    });

    it('should match Han text without word breaks', async () => {
      const results = await multilingual.search({ query: '向量检索' });
      expect(results.documents).toEqual(['résumé writing and 向量检索 basics']);
    });

    it('should tokenize Han runs as bigrams', () => {
      expect(tokenize('Résumé, MCP向量检索!')).toEqual(['résumé', 'mcp', '向量', '量检', '检索']);
      expect(tokenize('图 42')).toEqual(['图', '42']);
    });
  });

  describe('getLessonLink()', () => {
    it('should return the link or null', async () => {
      await expect(catalog.getLessonLink('Intro to MCP', 2)).resolves.toBe('https://example.com/intro/2');
      await expect(catalog.getLessonLink('Advanced MCP Servers', 1)).resolves.toBeNull();
      await expect(catalog.getLessonLink('Intro to MCP', 9)).resolves.toBeNull();
      await expect(catalog.getLessonLink('Missing', 1)).resolves.toBeNull();
    });
  });

  describe('fromFile()', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'catalog-test-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should load a JSON catalog', async () => {
      const path = join(dir, 'catalog.json');
      await writeFile(path, JSON.stringify(data), 'utf8');

      const loaded = await InMemoryCourseCatalog.fromFile(path);

      expect(loaded.courseCount).toBe(2);
    });

    it('should reject malformed JSON', async () => {
      const path = join(dir, 'broken.json');
      await writeFile(path, '{ not json', 'utf8');

      await expect(InMemoryCourseCatalog.fromFile(path)).rejects.toBeInstanceOf(ConfigurationError);
    });
  });
});
