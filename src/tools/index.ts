/**
 * @fileoverview Tools module public exports.
 *
 * @module rag-orchestrator/tools
 * @version 0.1.0
 */

export {
  createCourseTools,
  createCourseSearchTool,
  createCourseOutlineTool,
  SEARCH_TOOL_NAME,
  OUTLINE_TOOL_NAME,
} from './course-tools.js';
