import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { LibraryClient } from '../client.js';
import { ConfigurationError, NotFoundError, isApiError } from '../errors.js';
import type { ParsedManifest } from '../manifest/types.js';
import {
  CountingPacer,
  FakeSession,
  FakeTransport,
  SEARCH_URL,
  addDownloadableAsset,
  createMockLogger,
  expectSuccess,
  formatsUrl,
  manifestBytes,
} from './helpers.js';

function librarySession(): FakeSession {
  const session = new FakeSession({
    [SEARCH_URL]: (params) =>
      params['cursor'] === undefined
        ? {
            body: {
              results: [
                { uid: 'a1', listing: { title: 'Mossy Rocks' } },
                { uid: 'a2', title: 'Old Bricks' },
              ],
              cursors: { next: 'page-2' },
              total: 3,
            },
          }
        : { body: { results: [{ uid: 'a3', title: 'Sand' }], cursors: { next: null } } },
  });
  addDownloadableAsset(session, 'a1');
  addDownloadableAsset(session, 'a2');
  addDownloadableAsset(session, 'a3');
  return session;
}

function makeClient(session: FakeSession, pacer = new CountingPacer(0)): LibraryClient {
  return new LibraryClient({
    transport: new FakeTransport(session),
    logger: createMockLogger(),
    pacer,
  });
}

describe('LibraryClient', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'library-client-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('rejects invalid configuration at construction', () => {
    expect(
      () =>
        new LibraryClient({
          transport: new FakeTransport(new FakeSession()),
          config: { maxPages: 0 },
        }),
    ).toThrow(new ConfigurationError('Invalid client config: maxPages must be an integer of at least 1'));
  });

  it('exposes the effective configuration', () => {
    const client = new LibraryClient({
      transport: new FakeTransport(new FakeSession()),
      config: { requestDelayMs: 0, platform: 'Windows' },
    });

    expect(client.configuration.requestDelayMs).toBe(0);
    expect(client.configuration.platform).toBe('Windows');
    expect(client.configuration.formatCode).toBe('unreal-engine');
  });

  it('fetches the whole library with the default sort order', async () => {
    const session = librarySession();

    const library = await makeClient(session).getLibrary();

    expect(library.assets.map((asset) => asset.title)).toEqual(['Mossy Rocks', 'Old Bricks', 'Sand']);
    expect(library.totalCount).toBe(3);
    expect(session.calls.map((call) => call.params['sortBy'])).toEqual(['-createdAt', '-createdAt']);
  });

  it('yields pages with a custom sort order', async () => {
    const session = librarySession();
    let pages = 0;

    for await (const page of makeClient(session).getLibraryPages('title')) {
      pages += page.records.length > 0 ? 1 : 0;
    }

    expect(pages).toBe(2);
    expect(session.calls[0]?.params).toEqual({ sortBy: 'title', cursor: undefined });
  });

  it('finds a single asset', async () => {
    const asset = await makeClient(librarySession()).getAsset('a2');

    expect(asset.title).toBe('Old Bricks');
  });

  it('reports an asset missing from the library', async () => {
    const err = await makeClient(librarySession())
      .getAsset('zz')
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(NotFoundError);
    expect(err).toMatchObject({ message: 'Asset not found in library: zz' });
    expect(isApiError(err)).toBe(false);
  });

  it('lists formats and resolves manifests', async () => {
    const client = makeClient(librarySession());

    const formats = await client.listFormats('a1');
    const resolved = await client.resolveManifest('a1');

    expect(formats.map((format) => format.type)).toEqual(['unreal-engine']);
    expect(resolved.fileUid).toBe('a1-file');
  });

  it('downloads manifests for the library', async () => {
    const session = librarySession();
    const client = makeClient(session);

    const library = await client.getLibrary();
    const outcomes = await client.downloadManifests(library.assets, tmpDir);

    expect(outcomes.map((outcome) => outcome.success)).toEqual([true, true, true]);
    expect(fs.readdirSync(tmpDir).sort()).toEqual(['Mossy Rocks.json', 'Old Bricks.json', 'Sand.json']);
    expect((await expectSuccess(outcomes[2]).load()).appName).toBe('RockPack');
  });

  it('downloads a single manifest', async () => {
    const client = makeClient(librarySession());
    const asset = await client.getAsset('a3');

    const outcome = expectSuccess(await client.downloadManifest(asset, tmpDir));

    expect(outcome.filePath).toBe(path.join(tmpDir, 'Sand.json'));
  });

  it('keeps credentials off manifest hosts outside the API origin', async () => {
    const session = librarySession();
    const client = makeClient(session);
    const asset = await client.getAsset('a3');

    await client.downloadManifest(asset, tmpDir);

    expect(session.calls.slice(-3).map((call) => call.credentials)).toEqual([undefined, undefined, false]);
  });

  it('paces every request through one pacer', async () => {
    const session = librarySession();
    const pacer = new CountingPacer(250);
    const client = makeClient(session, pacer);

    const library = await client.getLibrary();
    await client.downloadManifests(library.assets.slice(0, 1), tmpDir);

    expect(session.calls).toHaveLength(5);
    expect(pacer.sleeps).toEqual([250, 250, 250, 250, 250]);
  });

  it('validates manifests on load when configured', async () => {
    const session = librarySession();
    addDownloadableAsset(session, 'a1', manifestBytes({ AppNameString: undefined }));
    const client = new LibraryClient({
      transport: new FakeTransport(session),
      config: { requestDelayMs: 0, validateManifests: true },
    });

    const outcome = expectSuccess(
      await client.downloadManifest(await client.getAsset('a1'), tmpDir),
    );

    await expect(outcome.load()).rejects.toThrow(
      'manifest failed schema validation: AppNameString: Required',
    );
  });

  it('uses a supplied manifest codec', async () => {
    const session = librarySession();
    const parsed: ParsedManifest = {
      version: '1',
      appId: '',
      appName: 'Custom',
      buildVersion: '',
      files: [],
      raw: {},
    };
    const parse = vi.fn(() => parsed);
    const client = new LibraryClient({
      transport: new FakeTransport(session),
      manifestCodec: { parse },
      config: { requestDelayMs: 0 },
    });

    const outcome = expectSuccess(
      await client.downloadManifest(await client.getAsset('a1'), tmpDir),
    );

    expect(await outcome.load()).toBe(parsed);
    expect(parse).toHaveBeenCalledTimes(1);
  });

  it('applies the configured output root', async () => {
    const session = librarySession();
    const client = new LibraryClient({
      transport: new FakeTransport(session),
      config: { requestDelayMs: 0, outputRoot: path.join(tmpDir, 'root') },
    });

    const outcome = await client.downloadManifest(await client.getAsset('a1'), tmpDir);

    expect(outcome.success).toBe(false);
    expect(session.urls()).toContain(formatsUrl('a1'));
  });

  it('closes the session once', async () => {
    const session = librarySession();
    const client = makeClient(session);

    await client.close();
    await client.close();

    expect(session.closeCount).toBe(1);
  });
});
