/**
 * DocumentStore Tests
 *
 * Lifecycle transitions, listing and the device catalog against a real
 * database in a temp directory.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'path';
import type Database from 'better-sqlite3';
import { openDatabase } from '../../../src/services/storage/database.js';
import {
  DocumentStore,
  DocumentStoreError,
  type NewDocument,
} from '../../../src/services/storage/document-store.js';
import { cleanupTempDir, createTempDir, sqliteVecAvailable } from '../../helpers.js';

function newDocument(overrides: Partial<NewDocument> = {}): NewDocument {
  return {
    file_name: 'wm-100.pdf',
    file_path: null,
    file_type: 'pdf',
    file_size: 2048,
    file_hash: 'sha256:abc',
    device_type: 'washing_machine',
    brand: 'Acme',
    model: 'WM-100',
    ...overrides,
  };
}

describe.skipIf(!sqliteVecAvailable)('DocumentStore', () => {
  let tempDir: string;
  let db: Database.Database;
  let store: DocumentStore;

  beforeEach(() => {
    tempDir = createTempDir('rag-store-');
    db = openDatabase(join(tempDir, 'store.db'), { dimension: 384 });
    store = new DocumentStore(db);
  });

  afterEach(() => {
    if (db.open) db.close();
    cleanupTempDir(tempDir);
  });

  describe('create and get', () => {
    it('creates a PENDING document with a UUID', () => {
      const doc = store.create(newDocument());
      expect(doc.id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
      expect(doc.lifecycle).toEqual({ status: 'PENDING' });
      expect(store.get(doc.id)).toEqual(doc);
    });

    it('stores a missing model as null', () => {
      const doc = store.create(newDocument({ model: null }));
      expect(store.require(doc.id).model).toBeNull();
    });

    it('returns null for an unknown id and require throws DOCUMENT_NOT_FOUND', () => {
      expect(store.get('missing')).toBeNull();
      expect(() => store.require('missing')).toThrow(DocumentStoreError);
      try {
        store.require('missing');
      } catch (error) {
        expect(error).toMatchObject({ code: 'DOCUMENT_NOT_FOUND', details: { documentId: 'missing' } });
      }
    });
  });

  describe('lifecycle', () => {
    it('moves PENDING -> PROCESSING -> INDEXED', () => {
      const { id } = store.create(newDocument());

      const processing = store.markProcessing(id);
      expect(processing.lifecycle.status).toBe('PROCESSING');

      const indexed = store.markIndexed(id, 3);
      expect(indexed.lifecycle).toMatchObject({ status: 'INDEXED', chunksCount: 3 });
    });

    it('moves PROCESSING -> FAILED with the error message', () => {
      const { id } = store.create(newDocument());
      store.markProcessing(id);

      const failed = store.markFailed(id, 'Insufficient text extracted from document');
      expect(failed.lifecycle).toMatchObject({
        status: 'FAILED',
        errorMessage: 'Insufficient text extracted from document',
      });
    });

    it('fails a PENDING document directly', () => {
      const { id } = store.create(newDocument());
      expect(store.markFailed(id, 'boom').lifecycle.status).toBe('FAILED');
    });

    it('substitutes a message for a blank error', () => {
      const { id } = store.create(newDocument());
      const failed = store.markFailed(id, '   ');
      expect(failed.lifecycle).toMatchObject({ errorMessage: 'Ingestion failed with no error message' });
    });

    it('refuses INDEXED without at least one chunk', () => {
      const { id } = store.create(newDocument());
      store.markProcessing(id);
      expect(() => store.markIndexed(id, 0)).toThrow(/with 0 chunks/);
      expect(store.require(id).lifecycle.status).toBe('PROCESSING');
    });

    it('refuses to skip PROCESSING', () => {
      const { id } = store.create(newDocument());
      expect(() => store.markIndexed(id, 2)).toThrow('Cannot move document');
      expect(store.require(id).lifecycle.status).toBe('PENDING');
    });

    it('refuses to leave a terminal state', () => {
      const { id } = store.create(newDocument());
      store.markProcessing(id);
      store.markIndexed(id, 1);

      expect(() => store.markFailed(id, 'late failure')).toThrow(DocumentStoreError);
      expect(() => store.markProcessing(id)).toThrow(DocumentStoreError);
      expect(store.require(id).lifecycle).toMatchObject({ status: 'INDEXED', chunksCount: 1 });
    });

    it('fails documents interrupted by a restart', () => {
      const pending = store.create(newDocument());
      const processing = store.create(newDocument());
      const indexed = store.create(newDocument());
      store.markProcessing(processing.id);
      store.markProcessing(indexed.id);
      store.markIndexed(indexed.id, 4);

      expect(store.failInterrupted('Ingestion interrupted by a server restart')).toBe(2);
      expect(store.require(pending.id).lifecycle).toMatchObject({
        status: 'FAILED',
        errorMessage: 'Ingestion interrupted by a server restart',
      });
      expect(store.require(processing.id).lifecycle.status).toBe('FAILED');
      expect(store.require(indexed.id).lifecycle.status).toBe('INDEXED');
    });
  });

  describe('list and delete', () => {
    it('filters by device type, brand and status', () => {
      const a = store.create(newDocument());
      store.create(newDocument({ brand: 'Zeta' }));
      store.create(newDocument({ device_type: 'tv', file_name: 'tv.txt', file_type: 'txt' }));
      store.markProcessing(a.id);

      expect(store.list().total).toBe(3);
      expect(store.list({ brand: 'Zeta' }).documents.map((d) => d.brand)).toEqual(['Zeta']);
      expect(store.list({ deviceType: 'tv' }).documents.map((d) => d.file_type)).toEqual(['txt']);
      expect(store.list({ status: 'PROCESSING' }).documents.map((d) => d.id)).toEqual([a.id]);
    });

    it('pages results and reports the unpaged total', () => {
      for (let i = 0; i < 5; i++) {
        store.create(newDocument({ file_name: `manual-${i}.pdf` }));
      }
      const page = store.list({ limit: 2, offset: 4 });
      expect(page.total).toBe(5);
      expect(page.documents).toHaveLength(1);
    });

    it('deletes a record', () => {
      const { id } = store.create(newDocument());
      expect(store.delete(id)).toBe(true);
      expect(store.get(id)).toBeNull();
      expect(store.delete(id)).toBe(false);
    });
  });

  describe('device catalog', () => {
    it('groups brands and models per device type', () => {
      store.recordDevice('tv', 'Zeta', 'Z9');
      store.recordDevice('tv', 'Acme', 'X1');
      store.recordDevice('tv', 'Acme', null);
      store.recordDevice('tv', 'Acme', 'X1');
      store.recordDevice('washing_machine', 'Acme', 'WM-100');

      const devices = store.listDevices();
      expect(devices.map((d) => ({ device_type: d.device_type, brands: d.brands, models: d.models }))).toEqual([
        { device_type: 'tv', brands: ['Acme', 'Zeta'], models: { Acme: ['X1'], Zeta: ['Z9'] } },
        { device_type: 'washing_machine', brands: ['Acme'], models: { Acme: ['WM-100'] } },
      ]);
    });

    it('gets one device type or null', () => {
      store.recordDevice('tv', 'Acme', null);
      expect(store.getDevice('tv')).toMatchObject({ device_type: 'tv', brands: ['Acme'], models: { Acme: [] } });
      expect(store.getDevice('fridge')).toBeNull();
    });
  });
});
