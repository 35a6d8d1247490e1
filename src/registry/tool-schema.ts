/**
 * @fileoverview Derives the model-facing JSON schema of a tool from its zod schema.
 *
 * @module rag-orchestrator/registry/tool-schema
 * @version 0.1.0
 */

import { zodToJsonSchema } from 'zod-to-json-schema';
import type { ToolDefinition, ToolSchema } from '../types/tools.types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Converts a tool definition into the schema offered to the model.
 * Only object schemas describe tool input, so anything else yields an
 * empty parameter list.
 */
export function toToolSchema(definition: ToolDefinition): ToolSchema {
  const jsonSchema: Record<string, unknown> = {
    ...zodToJsonSchema(definition.inputSchema, { $refStrategy: 'none' }),
  };

  const properties = isRecord(jsonSchema['properties']) ? jsonSchema['properties'] : {};
  const required = Array.isArray(jsonSchema['required'])
    ? jsonSchema['required'].filter((key): key is string => typeof key === 'string')
    : [];

  return {
    name: definition.name,
    description: definition.description,
    input_schema: { type: 'object', properties, required },
  };
}
