/**
 * Ingestion MCP Tools
 *
 * Tools: manual_ingest
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module tools/ingestion
 */

import { existsSync, readFileSync, statSync } from 'fs';
import { basename, resolve } from 'path';
import { pathNotFoundError } from '../server/errors.js';
import { requireRuntime } from '../server/state.js';
import { successResult } from '../server/types.js';
import { validateInput, IngestInput, ValidationError } from '../utils/validation.js';
import { toDocumentResponse } from './documents.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

export async function handleIngest(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(IngestInput, params);
    const filePath = resolve(input.file_path);
    if (!existsSync(filePath)) {
      throw pathNotFoundError(filePath);
    }
    if (!statSync(filePath).isFile()) {
      throw new ValidationError(`Not a file: ${filePath}`);
    }

    const runtime = requireRuntime();
    const documentId = runtime.ingest({
      bytes: readFileSync(filePath),
      fileName: basename(filePath),
      filePath,
      deviceType: input.device_type,
      brand: input.brand,
      model: input.model,
    });

    const doc = input.wait ? await runtime.waitForDocument(documentId) : runtime.getDocument(documentId);
    return formatResponse(
      successResult({
        document: toDocumentResponse(doc),
        message: input.wait
          ? `Ingestion finished with status ${doc.lifecycle.status}`
          : 'Ingestion started. Poll manual_document_get until the status is INDEXED or FAILED.',
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export const ingestionTools: Record<string, ToolDefinition> = {
  manual_ingest: {
    description:
      'Ingest a device manual (PDF or plain text) from a local file path. Tag it with device_type, brand and optional model so queries can filter on them. Set wait=true to block until indexing finishes.',
    inputSchema: IngestInput.shape,
    handler: handleIngest,
  },
};
