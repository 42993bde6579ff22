/**
 * Device Manual RAG - Zod Validation Schemas
 *
 * Input validation for all MCP tool inputs.
 *
 * @module utils/validation
 */

import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════════
// CUSTOM ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Custom validation error with descriptive message
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @throws ValidationError with descriptive message if validation fails
 */
export function validateInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const errors = result.error.errors.map((e) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    });
    throw new ValidationError(errors.join('; '));
  }
  return result.data;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SHARED BASE SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

const DocumentId = z.string().uuid('document_id must be a UUID');

/** Metadata label such as a device type or brand; surrounding whitespace is dropped */
const Label = z.string().trim().min(1).max(100);

export const DocumentStatusSchema = z.enum(['PENDING', 'PROCESSING', 'INDEXED', 'FAILED']);

// ═══════════════════════════════════════════════════════════════════════════════
// DOCUMENT SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const IngestInput = z.object({
  file_path: z.string().min(1, 'file_path is required'),
  device_type: z.string().trim().min(1, 'device_type is required').max(100),
  brand: z.string().trim().min(1, 'brand is required').max(100),
  model: z.string().trim().max(100).nullable().optional(),
  wait: z
    .boolean()
    .default(false)
    .describe('Wait for the ingestion job to settle before returning'),
});

export const DocumentGetInput = z.object({
  document_id: DocumentId,
});

export const DocumentListInput = z.object({
  device_type: Label.optional(),
  brand: Label.optional(),
  status: DocumentStatusSchema.optional(),
  limit: z.number().int().min(1).max(500).default(50),
  offset: z.number().int().min(0).default(0),
});

export const DocumentDeleteInput = z.object({
  document_id: DocumentId,
});

// ═══════════════════════════════════════════════════════════════════════════════
// QUERY SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const QueryInput = z.object({
  query: z.string().trim().min(1, 'query is required').max(1000, 'query must be 1000 characters or less'),
  device_type: Label.optional(),
  brand: Label.optional(),
  model: Label.optional(),
  top_k: z.number().int().min(1).max(50).optional(),
  relevance_threshold: z.number().min(0).max(1).optional(),
});

// ═══════════════════════════════════════════════════════════════════════════════
// DEVICE SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const DeviceGetInput = z.object({
  device_type: Label,
});
