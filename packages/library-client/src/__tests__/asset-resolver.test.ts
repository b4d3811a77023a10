import { describe, it, expect } from 'vitest';
import { APIError, NotFoundError, ValidationError, isApiError } from '../errors.js';
import { ApiRequester } from '../http/api-requester.js';
import { RequestPacer } from '../http/pacer.js';
import {
  AssetResolver,
  findFileUid,
  normalizeFormats,
  selectManifestEntry,
} from '../resolver/asset-resolver.js';
import {
  FakeSession,
  TEST_ENDPOINTS,
  addDownloadableAsset,
  createMockLogger,
  downloadInfoUrl,
  formatsUrl,
  manifestUrl,
} from './helpers.js';

function makeResolver(session: FakeSession, platform = 'Mac'): AssetResolver {
  const logger = createMockLogger();
  const requester = new ApiRequester(session, new RequestPacer(0), logger);
  return new AssetResolver(requester, TEST_ENDPOINTS, { formatCode: 'unreal-engine', platform }, logger);
}

describe('normalizeFormats', () => {
  it('accepts a bare list', () => {
    const formats = normalizeFormats([{ type: 'unreal-engine', files: [{ uid: 'f1' }] }]);

    expect(formats).toHaveLength(1);
    expect(formats[0]?.type).toBe('unreal-engine');
    expect(formats[0]?.files.map((file) => file.uid)).toEqual(['f1']);
  });

  it('unwraps a list held under a known key', () => {
    expect(normalizeFormats({ assetFormats: [{ type: 'a' }] }).map((f) => f.type)).toEqual(['a']);
    expect(normalizeFormats({ formats: [{ type: 'b' }] }).map((f) => f.type)).toEqual(['b']);
    expect(normalizeFormats({ results: [{ type: 'c' }] }).map((f) => f.type)).toEqual(['c']);
  });

  it('treats a single object as a one-element list', () => {
    const formats = normalizeFormats({ type: 'unreal-engine', files: [{ uid: 'f1' }] });

    expect(formats.map((f) => f.type)).toEqual(['unreal-engine']);
  });

  it('reads the type from assetFormatType when type is absent', () => {
    const formats = normalizeFormats([{ assetFormatType: { code: 'fbx' }, files: [] }]);

    expect(formats[0]?.type).toBe('fbx');
  });

  it('drops files without a uid and ignores unusable bodies', () => {
    const formats = normalizeFormats([{ type: 'fbx', files: [{ name: 'x' }, { uid: '' }, { uid: 'f2' }] }]);

    expect(formats[0]?.files.map((file) => file.uid)).toEqual(['f2']);
    expect(normalizeFormats(null)).toEqual([]);
    expect(normalizeFormats('formats')).toEqual([]);
  });
});

describe('findFileUid', () => {
  it('picks the first file of the first matching format that has files', () => {
    const formats = normalizeFormats([
      { type: 'fbx', files: [{ uid: 'fbx-1' }] },
      { type: 'unreal-engine', files: [] },
      { type: 'unreal-engine', files: [{ uid: 'ue-1' }, { uid: 'ue-2' }] },
    ]);

    expect(findFileUid(formats, 'unreal-engine')).toBe('ue-1');
    expect(findFileUid(formats, 'glb')).toBeUndefined();
  });
});

describe('selectManifestEntry', () => {
  it('returns the first manifest entry', () => {
    const location = selectManifestEntry([
      { type: 'chunk', downloadUrl: 'https://cdn.test/chunk' },
      { type: 'manifest', downloadUrl: 'https://cdn.test/m.json', expires: '2030-01-01T00:00:00Z' },
      { type: 'manifest', downloadUrl: 'https://cdn.test/other.json' },
    ]);

    expect(location).toEqual({ url: 'https://cdn.test/m.json', expires: '2030-01-01T00:00:00Z' });
  });

  it('fails when there is no manifest entry', () => {
    expect(() => selectManifestEntry([{ type: 'chunk' }])).toThrow(
      'download-info has no manifest entry',
    );
  });

  it('fails when the manifest entry has no URL', () => {
    expect(() => selectManifestEntry([{ type: 'manifest' }])).toThrow(
      'download-info manifest entry has no downloadUrl',
    );
  });

  it('rejects URLs that are not absolute http(s)', () => {
    expect(() => selectManifestEntry([{ type: 'manifest', downloadUrl: '/m.json' }])).toThrow(
      ValidationError,
    );
    expect(() => selectManifestEntry([{ type: 'manifest', downloadUrl: 'file:///etc/passwd' }])).toThrow(
      ValidationError,
    );
  });
});

describe('AssetResolver', () => {
  it('resolves the manifest URL for the target format', async () => {
    const session = new FakeSession();
    addDownloadableAsset(session, 'a1');

    const resolved = await makeResolver(session).resolve('a1');

    expect(resolved).toEqual({
      assetUid: 'a1',
      fileUid: 'a1-file',
      url: manifestUrl('a1'),
      expires: undefined,
    });
    expect(session.calls).toEqual([
      { url: formatsUrl('a1'), params: {} },
      { url: downloadInfoUrl('a1', 'a1-file'), params: { platform: 'Mac' } },
    ]);
  });

  it('omits the platform parameter when it is empty', async () => {
    const session = new FakeSession();
    addDownloadableAsset(session, 'a1');

    await makeResolver(session, '').resolve('a1');

    expect(session.calls[1]?.params['platform']).toBeUndefined();
  });

  it('encodes asset uids into the URL', async () => {
    const session = new FakeSession({ [formatsUrl('a%2F1')]: { body: [] } });

    await makeResolver(session).listFormats('a/1');

    expect(session.urls()).toEqual(['https://marketplace.test/library/a%2F1/formats']);
  });

  it('fails without a file for the target format', async () => {
    const session = new FakeSession({
      [formatsUrl('a1')]: { body: [{ type: 'fbx', files: [{ uid: 'f1' }] }] },
    });

    const err = await makeResolver(session)
      .resolve('a1')
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(NotFoundError);
    expect(err).toMatchObject({ message: 'No unreal-engine format file found for asset' });
    expect(isApiError(err)).toBe(false);
    expect(session.calls).toHaveLength(1);
  });

  it('fails when download info has no manifest entry', async () => {
    const session = new FakeSession({
      [formatsUrl('a1')]: { body: { formats: [{ type: 'unreal-engine', files: [{ uid: 'f1' }] }] } },
      [downloadInfoUrl('a1', 'f1')]: { body: { downloadInfo: [{ type: 'chunk' }] } },
    });

    await expect(makeResolver(session).resolve('a1')).rejects.toThrow(NotFoundError);
  });

  it('rejects a download info payload of the wrong shape', async () => {
    const session = new FakeSession({ [downloadInfoUrl('a1', 'f1')]: { body: { downloadInfo: 'x' } } });

    await expect(makeResolver(session).resolveManifestUrl('a1', 'f1')).rejects.toThrow(APIError);
  });

  it('propagates HTTP failures', async () => {
    const session = new FakeSession({ [formatsUrl('a1')]: { status: 503 } });

    await expect(makeResolver(session).listFormats('a1')).rejects.toThrow(
      'asset-formats returned HTTP 503',
    );
  });
});
