/**
 * Integration Tests for Manual MCP Tools
 *
 * Tests: manual_ingest, manual_document_get, manual_document_list,
 * manual_document_delete, manual_query, manual_device_list, manual_device_get,
 * manual_health
 *
 * Handlers run against a real runtime on a temp database, with hashing
 * embeddings and a scripted language model.
 *
 * @module tests/integration/server/manual-tools
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { requireRuntime, resetState, setRuntime } from '../../../src/server/state.js';
import { registerAllTools } from '../../../src/server/register-tools.js';
import { createRagRuntime } from '../../../src/services/runtime.js';
import { handleIngest } from '../../../src/tools/ingestion.js';
import {
  handleDocumentDelete,
  handleDocumentGet,
  handleDocumentList,
} from '../../../src/tools/documents.js';
import { handleQuery } from '../../../src/tools/query.js';
import { handleDeviceGet, handleDeviceList } from '../../../src/tools/devices.js';
import { handleHealth } from '../../../src/tools/health.js';
import { EmbeddingError } from '../../../src/services/embedding/client.js';
import { ProviderError } from '../../../src/services/generation/llm/client.js';
import type { ToolResponse } from '../../../src/tools/shared.js';
import {
  ScriptedLanguageModel,
  cleanupTempDir,
  createTempDir,
  sqliteVecAvailable,
  testConfig,
} from '../../helpers.js';

const MANUAL_TEXT = [
  'Troubleshooting',
  '',
  'Error E21 means the washer cannot drain. Unplug the washer, open the filter door and remove lint from the drain pump filter.',
  '',
  'Check that the drain hose is not kinked before starting a Rinse and Spin cycle.',
].join('\n');

const UNKNOWN_ID = '00000000-0000-4000-8000-000000000000';

const IngestBody = z.object({
  success: z.literal(true),
  data: z.object({
    document: z.object({ id: z.string(), status: z.string() }),
    message: z.string(),
  }),
});

function parseBody(result: ToolResponse): unknown {
  return JSON.parse(result.content[0].text);
}

function errorCategory(result: ToolResponse): unknown {
  expect(result.isError).toBe(true);
  return z
    .object({ error: z.object({ category: z.string() }) })
    .parse(parseBody(result)).error.category;
}

// ═══════════════════════════════════════════════════════════════════════════════
// TEST SETUP
// ═══════════════════════════════════════════════════════════════════════════════

describe.skipIf(!sqliteVecAvailable)('manual tools', () => {
  let tempDir: string;
  let manualPath: string;
  let llm: ScriptedLanguageModel;

  beforeEach(() => {
    tempDir = createTempDir('rag-tools-');
    manualPath = join(tempDir, 'wm-100.txt');
    writeFileSync(manualPath, MANUAL_TEXT);
    llm = new ScriptedLanguageModel();
    setRuntime(
      createRagRuntime(testConfig({ storage: { databasePath: join(tempDir, 'manuals.db') } }), {
        languageModel: llm,
      })
    );
  });

  afterEach(() => {
    resetState();
    cleanupTempDir(tempDir);
  });

  async function ingestManual(): Promise<string> {
    const result = await handleIngest({
      file_path: manualPath,
      device_type: 'washing_machine',
      brand: 'Acme',
      model: 'WM-100',
      wait: true,
    });
    return IngestBody.parse(parseBody(result)).data.document.id;
  }

  // ═════════════════════════════════════════════════════════════════════════════
  // manual_ingest
  // ═════════════════════════════════════════════════════════════════════════════

  describe('manual_ingest', () => {
    it('indexes the file when wait is true', async () => {
      const result = await handleIngest({
        file_path: manualPath,
        device_type: 'washing_machine',
        brand: 'Acme',
        wait: true,
      });

      expect(result.isError).toBeUndefined();
      expect(parseBody(result)).toMatchObject({
        success: true,
        data: {
          document: {
            file_name: 'wm-100.txt',
            file_path: manualPath,
            file_type: 'txt',
            model: null,
            status: 'INDEXED',
            chunks_count: 1,
            error_message: null,
          },
          message: 'Ingestion finished with status INDEXED',
        },
      });
    });

    it('returns a PENDING document without wait', async () => {
      const body = IngestBody.parse(
        parseBody(await handleIngest({ file_path: manualPath, device_type: 'tv', brand: 'Zeta' }))
      );

      expect(body.data.document.status).toBe('PENDING');
      expect(body.data.message).toBe(
        'Ingestion started. Poll manual_document_get until the status is INDEXED or FAILED.'
      );

      await requireRuntime().ingestion.drain();
      const settled = await handleDocumentGet({ document_id: body.data.document.id });
      expect(parseBody(settled)).toMatchObject({ data: { status: 'INDEXED', device_type: 'tv' } });
    });

    it('reports a missing file as PATH_NOT_FOUND', async () => {
      const result = await handleIngest({
        file_path: join(tempDir, 'missing.pdf'),
        device_type: 'tv',
        brand: 'Zeta',
      });
      expect(errorCategory(result)).toBe('PATH_NOT_FOUND');
    });

    it('rejects a directory', async () => {
      const dir = join(tempDir, 'folder.txt');
      mkdirSync(dir);
      const result = await handleIngest({ file_path: dir, device_type: 'tv', brand: 'Zeta' });
      expect(errorCategory(result)).toBe('VALIDATION_ERROR');
    });

    it('requires a brand', async () => {
      const result = await handleIngest({ file_path: manualPath, device_type: 'tv', brand: ' ' });
      expect(errorCategory(result)).toBe('VALIDATION_ERROR');
    });

    it('rejects an unsupported file type', async () => {
      const docxPath = join(tempDir, 'manual.docx');
      writeFileSync(docxPath, MANUAL_TEXT);
      const result = await handleIngest({ file_path: docxPath, device_type: 'tv', brand: 'Zeta' });
      expect(errorCategory(result)).toBe('VALIDATION_ERROR');
    });
  });

  // ═════════════════════════════════════════════════════════════════════════════
  // manual_document_*
  // ═════════════════════════════════════════════════════════════════════════════

  describe('manual_document_get', () => {
    it('returns the document with its lifecycle fields', async () => {
      const id = await ingestManual();
      expect(parseBody(await handleDocumentGet({ document_id: id }))).toMatchObject({
        success: true,
        data: { id, brand: 'Acme', model: 'WM-100', status: 'INDEXED', chunks_count: 1 },
      });
    });

    it('rejects an id that is not a UUID', async () => {
      const result = await handleDocumentGet({ document_id: 'doc-1' });
      expect(errorCategory(result)).toBe('VALIDATION_ERROR');
      expect(parseBody(result)).toMatchObject({
        error: { message: 'document_id: document_id must be a UUID' },
      });
    });

    it('reports an unknown id as DOCUMENT_NOT_FOUND', async () => {
      expect(errorCategory(await handleDocumentGet({ document_id: UNKNOWN_ID }))).toBe(
        'DOCUMENT_NOT_FOUND'
      );
    });
  });

  describe('manual_document_list', () => {
    it('lists documents with pagination defaults', async () => {
      const id = await ingestManual();
      expect(parseBody(await handleDocumentList({}))).toMatchObject({
        data: { documents: [{ id }], total: 1, limit: 50, offset: 0 },
      });
    });

    it('filters by status', async () => {
      await ingestManual();
      expect(parseBody(await handleDocumentList({ status: 'FAILED' }))).toMatchObject({
        data: { documents: [], total: 0 },
      });
    });
  });

  describe('manual_document_delete', () => {
    it('deletes the document and its chunks', async () => {
      const id = await ingestManual();

      expect(parseBody(await handleDocumentDelete({ document_id: id }))).toEqual({
        success: true,
        data: { document_id: id, chunks_removed: 1, deleted: true },
      });
      expect(errorCategory(await handleDocumentGet({ document_id: id }))).toBe('DOCUMENT_NOT_FOUND');
    });
  });

  // ═════════════════════════════════════════════════════════════════════════════
  // manual_query
  // ═════════════════════════════════════════════════════════════════════════════

  describe('manual_query', () => {
    it('answers with sources from the indexed manual', async () => {
      await ingestManual();

      const result = await handleQuery({ query: 'washer error E21', device_type: 'washing_machine' });

      expect(parseBody(result)).toMatchObject({
        success: true,
        data: {
          answer: 'Check that the drain hose is not kinked.',
          context_found: true,
          model: 'scripted-model',
          sources: [{ source_file: 'wm-100.txt', page_number: 1, section_name: 'troubleshooting' }],
        },
      });
    });

    it('reports context_found false when no manual matches the filter', async () => {
      await ingestManual();

      const result = await handleQuery({ query: 'washer error E21', brand: 'Nobody' });

      expect(parseBody(result)).toMatchObject({
        data: { context_found: false, sources: [], model: null },
      });
      expect(llm.generate).not.toHaveBeenCalled();
    });

    it('rejects an empty query', async () => {
      const result = await handleQuery({ query: '   ' });
      expect(errorCategory(result)).toBe('VALIDATION_ERROR');
      expect(parseBody(result)).toMatchObject({ error: { message: 'query: query is required' } });
    });
  });

  // ═════════════════════════════════════════════════════════════════════════════
  // manual_device_*
  // ═════════════════════════════════════════════════════════════════════════════

  describe('manual_device_list and manual_device_get', () => {
    it('lists devices from ingested manuals', async () => {
      await ingestManual();
      expect(parseBody(await handleDeviceList({}))).toMatchObject({
        data: {
          devices: [{ device_type: 'washing_machine', brands: ['Acme'], models: { Acme: ['WM-100'] } }],
          total: 1,
        },
      });
    });

    it('gets one device type', async () => {
      await ingestManual();
      expect(parseBody(await handleDeviceGet({ device_type: 'washing_machine' }))).toMatchObject({
        data: { device_type: 'washing_machine', brands: ['Acme'] },
      });
    });

    it('reports an unknown device type as DOCUMENT_NOT_FOUND', async () => {
      expect(errorCategory(await handleDeviceGet({ device_type: 'fridge' }))).toBe('DOCUMENT_NOT_FOUND');
    });
  });

  // ═════════════════════════════════════════════════════════════════════════════
  // manual_health
  // ═════════════════════════════════════════════════════════════════════════════

  describe('manual_health', () => {
    it('reports every service healthy', async () => {
      await ingestManual();
      const result = await handleHealth({});

      expect(result.isError).toBeUndefined();
      expect(parseBody(result)).toMatchObject({
        success: true,
        data: {
          status: 'healthy',
          services: {
            database: {
              status: 'healthy',
              path: join(tempDir, 'manuals.db'),
              sqlite_vec_version: expect.any(String),
              documents: 1,
            },
            embedding: {
              status: 'healthy',
              provider: 'hashing',
              model: 'feature-hashing-v1',
              dimension: 384,
            },
            llm: { status: 'healthy', provider: 'scripted', model: 'scripted-model' },
          },
        },
      });
      expect(llm.checkHealth).toHaveBeenCalledTimes(1);
      expect(llm.generate).not.toHaveBeenCalled();
    });

    it('reports an unreachable language model as degraded', async () => {
      llm.checkHealth.mockRejectedValueOnce(
        new ProviderError('ollama is unreachable: fetch failed', 'PROVIDER_UNAVAILABLE')
      );
      const result = await handleHealth({});

      expect(result.isError).toBeUndefined();
      expect(parseBody(result)).toMatchObject({
        data: {
          status: 'degraded',
          services: {
            database: { status: 'healthy' },
            embedding: { status: 'healthy' },
            llm: { status: 'degraded', error: 'ollama is unreachable: fetch failed' },
          },
        },
      });
    });

    it('reports a failing embedding provider as unhealthy', async () => {
      setRuntime(
        createRagRuntime(testConfig({ storage: { databasePath: join(tempDir, 'broken.db') } }), {
          languageModel: llm,
          embeddingClient: {
            modelName: 'broken-model',
            dimensions: 384,
            embedBatch: async (): Promise<Float32Array[]> => {
              throw new EmbeddingError('Embedding worker exited with code 1', 'EMBEDDING_FAILED');
            },
          },
        })
      );

      expect(parseBody(await handleHealth({}))).toMatchObject({
        data: {
          status: 'unhealthy',
          services: {
            embedding: {
              status: 'unhealthy',
              model: 'broken-model',
              error: 'Embedding worker exited with code 1',
            },
            llm: { status: 'healthy' },
          },
        },
      });
    });
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════════

describe('registerAllTools', () => {
  it('registers every manual tool once', () => {
    const server = new McpServer({ name: 'manual-tools-test', version: '0.0.0' });
    const toolSpy = vi.spyOn(server, 'tool');

    expect(registerAllTools(server)).toBe(8);
    expect(toolSpy.mock.calls.map((call) => call[0])).toEqual([
      'manual_ingest',
      'manual_document_get',
      'manual_document_list',
      'manual_document_delete',
      'manual_query',
      'manual_device_list',
      'manual_device_get',
      'manual_health',
    ]);
  });
});
