import { mkdtemp, rm, writeFile, mkdir } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { LocalStorageBackend } from './local-storage.backend';
import {
  StorageNotFoundException,
  StorageUnavailableException,
} from './storage.exceptions';

const DOCUMENT_ID = '5d1c7f0e-2b3a-4c5d-8e9f-0a1b2c3d4e5f';

describe('LocalStorageBackend', () => {
  let root: string;
  let backend: LocalStorageBackend;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'papertrail-storage-'));
    backend = new LocalStorageBackend(root);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('returns byte-identical content for the locator it produced', async () => {
    const bytes = Buffer.from([0x25, 0x50, 0x44, 0x46, 0x00, 0xff, 0x10]);

    const locator = await backend.put(bytes, {
      documentId: DOCUMENT_ID,
      fileName: 'Quarterly Report.pdf',
      contentType: 'application/pdf',
    });

    expect(locator).toBe(`documents/${DOCUMENT_ID}/quarterly_report.pdf`);
    expect((await backend.get(locator)).equals(bytes)).toBe(true);
    expect(await backend.exists(locator)).toBe(true);
  });

  it('rewrites only the same document on a repeated put', async () => {
    const metadata = {
      documentId: DOCUMENT_ID,
      fileName: 'a.txt',
      contentType: 'text/plain',
    };
    const other = await backend.put(Buffer.from('other'), {
      ...metadata,
      documentId: '9e8d7c6b-5a4f-4e3d-8c2b-1a0f9e8d7c6b',
    });

    const first = await backend.put(Buffer.from('first'), metadata);
    const second = await backend.put(Buffer.from('second'), metadata);

    expect(second).toBe(first);
    expect((await backend.get(first)).toString()).toBe('second');
    expect((await backend.get(other)).toString()).toBe('other');
  });

  it('throws StorageNotFoundException for an unknown locator', async () => {
    await expect(
      backend.get(`documents/${DOCUMENT_ID}/missing.txt`),
    ).rejects.toBeInstanceOf(StorageNotFoundException);
    expect(await backend.exists(`documents/${DOCUMENT_ID}/missing.txt`)).toBe(
      false,
    );
  });

  it('treats locators escaping the root as unknown', async () => {
    await expect(backend.get('../outside.txt')).rejects.toBeInstanceOf(
      StorageNotFoundException,
    );
    expect(await backend.exists('../outside.txt')).toBe(false);
  });

  it('reports an unwritable medium as unavailable', async () => {
    // A regular file where the documents/ directory should be
    await writeFile(join(root, 'documents'), 'not a directory');

    await expect(
      backend.put(Buffer.from('x'), {
        documentId: DOCUMENT_ID,
        fileName: 'x.txt',
        contentType: 'text/plain',
      }),
    ).rejects.toBeInstanceOf(StorageUnavailableException);
  });

  it('does not report a directory as stored content', async () => {
    await mkdir(join(root, 'documents', DOCUMENT_ID), { recursive: true });

    expect(await backend.exists(`documents/${DOCUMENT_ID}`)).toBe(false);
  });
});
