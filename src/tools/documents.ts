/**
 * Document Management MCP Tools
 *
 * Tools: manual_document_get, manual_document_list, manual_document_delete
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module tools/documents
 */

import { describeLifecycle, type ManualDocument } from '../models/document.js';
import { requireRuntime } from '../server/state.js';
import { successResult } from '../server/types.js';
import {
  validateInput,
  DocumentDeleteInput,
  DocumentGetInput,
  DocumentListInput,
} from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

/**
 * Flatten a document and its lifecycle into the tool response shape
 */
export function toDocumentResponse(doc: ManualDocument): Record<string, unknown> {
  return {
    id: doc.id,
    file_name: doc.file_name,
    file_path: doc.file_path,
    file_type: doc.file_type,
    file_size: doc.file_size,
    file_hash: doc.file_hash,
    device_type: doc.device_type,
    brand: doc.brand,
    model: doc.model,
    uploaded_at: doc.uploaded_at,
    ...describeLifecycle(doc.lifecycle),
  };
}

export async function handleDocumentGet(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(DocumentGetInput, params);
    const doc = requireRuntime().getDocument(input.document_id);
    return formatResponse(successResult(toDocumentResponse(doc)));
  } catch (error) {
    return handleError(error);
  }
}

export async function handleDocumentList(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(DocumentListInput, params);
    const { documents, total } = requireRuntime().listDocuments({
      deviceType: input.device_type,
      brand: input.brand,
      status: input.status,
      limit: input.limit,
      offset: input.offset,
    });
    return formatResponse(
      successResult({
        documents: documents.map(toDocumentResponse),
        total,
        limit: input.limit,
        offset: input.offset,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export async function handleDocumentDelete(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(DocumentDeleteInput, params);
    const result = await requireRuntime().deleteDocument(input.document_id);
    return formatResponse(successResult({ ...result, deleted: true }));
  } catch (error) {
    return handleError(error);
  }
}

export const documentTools: Record<string, ToolDefinition> = {
  manual_document_get: {
    description:
      'Get one manual by id, including its ingestion status (PENDING, PROCESSING, INDEXED or FAILED), chunk count or error message.',
    inputSchema: DocumentGetInput.shape,
    handler: handleDocumentGet,
  },
  manual_document_list: {
    description:
      'List ingested manuals, newest first. Filter by device_type, brand or status; paginate with limit/offset.',
    inputSchema: DocumentListInput.shape,
    handler: handleDocumentList,
  },
  manual_document_delete: {
    description:
      'Delete a manual and all of its indexed chunks. Rejected while the manual is still being processed.',
    inputSchema: DocumentDeleteInput.shape,
    handler: handleDocumentDelete,
  },
};
