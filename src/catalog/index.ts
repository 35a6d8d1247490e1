/**
 * @fileoverview Catalog module public exports.
 *
 * @module rag-orchestrator/catalog
 * @version 0.1.0
 */

export {
  InMemoryCourseCatalog,
  CatalogDataSchema,
  type CatalogData,
  type InMemoryCatalogOptions,
} from './in-memory-catalog.js';
