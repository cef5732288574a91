import { afterEach, describe, test, expect, vi } from 'vitest';
import catalogFixture from '../test/fixtures/catalog.json';
import { CatalogService, matchesQuery, parseCatalog, type CatalogOptions } from './catalog';

const parseOptions = { imageNamespace: 'mhubai', documentationBaseUrl: 'https://mhub.ai/models/' };

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function fakeFetch(respond: (call: number) => Response) {
  const urls: string[] = [];
  const fetchImpl: typeof fetch = async (input) => {
    urls.push(String(input));
    return respond(urls.length);
  };
  return { fetchImpl, urls };
}

function createService(fetchImpl: typeof fetch, overrides: Partial<CatalogOptions> = {}): CatalogService {
  return new CatalogService({
    url: 'https://catalog.test/models',
    imageNamespace: 'mhubai',
    documentationBaseUrl: 'https://mhub.ai/models',
    timeoutMs: 1000,
    maxRetries: 2,
    refreshIntervalMs: 0,
    retryDelayMs: 1,
    fetchImpl,
    ...overrides,
  });
}

describe('parseCatalog', () => {
  test('maps entries to descriptors', () => {
    const { models } = parseCatalog(catalogFixture, parseOptions);

    expect(models.map((m) => m.id)).toEqual(['1', '2', '3']);
    expect(models[0]).toEqual({
      id: '1',
      name: 'lungmask',
      label: 'LungMask',
      description: 'Lung segmentation from chest CT',
      modalities: ['CT'],
      categories: ['Segmentation'],
      regions: ['LEFT_LUNG', 'RIGHT_LUNG'],
      inputs: [{ description: 'chest CT series', format: 'DICOM' }],
      inputsCompatible: true,
      image: { repository: 'mhubai/lungmask', tag: 'latest' },
      documentationUrl: 'https://mhub.ai/models/lungmask',
      cite: 'Example et al., Lung segmentation, 2020',
    });
  });

  test('reads named objects, explicit regions and explicit images', () => {
    const { models } = parseCatalog(catalogFixture, parseOptions);
    const total = models[1];

    expect(total.modalities).toEqual(['CT']);
    expect(total.categories).toEqual(['Segmentation']);
    expect(total.regions).toEqual(['LIVER', 'SPLEEN']);
    expect(total.image).toEqual({ repository: 'mhubai/totalsegmentator', tag: 'v2', digest: 'sha256:feed' });
  });

  test('flags models that do not take a single DICOM input', () => {
    const { models } = parseCatalog(catalogFixture, parseOptions);
    expect(models[2].inputsCompatible).toBe(false);
  });

  test('drops invalid and duplicate entries with a warning each', () => {
    const { warnings } = parseCatalog(catalogFixture, parseOptions);
    expect(warnings).toEqual([
      'Dropped catalog entry #3: name: Model name must be a valid image name',
      'Dropped catalog entry #4: duplicate id 1',
    ]);
  });

  test('accepts a bare array', () => {
    const { models } = parseCatalog([{ id: 'x', name: 'solo' }], parseOptions);
    expect(models).toHaveLength(1);
    expect(models[0].label).toBe('solo');
    expect(models[0].inputsCompatible).toBe(false);
  });

  test('rejects a payload that is not a list', () => {
    expect(() => parseCatalog({ models: 'nope' }, parseOptions)).toThrow('Catalog payload is not a model list');
  });
});

describe('matchesQuery', () => {
  test('matches name, label, modality and region case-insensitively', () => {
    const { models } = parseCatalog(catalogFixture, parseOptions);
    const total = models[1];

    expect(matchesQuery(total, 'TOTALSEG')).toBe(true);
    expect(matchesQuery(total, 'spleen')).toBe(true);
    expect(matchesQuery(total, 'ct')).toBe(true);
    expect(matchesQuery(total, 'prostate')).toBe(false);
    expect(matchesQuery(total, '   ')).toBe(true);
  });
});

describe('CatalogService', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  test('fetches on first use and caches the snapshot', async () => {
    const { fetchImpl, urls } = fakeFetch(() => jsonResponse(catalogFixture));
    const service = createService(fetchImpl);

    expect(service.getSnapshot()).toBeNull();
    expect((await service.search()).map((m) => m.name)).toEqual(['lungmask', 'totalsegmentator', 'fmcib_radiomics']);
    expect((await service.search('liver')).map((m) => m.name)).toEqual(['totalsegmentator']);
    expect(urls).toEqual(['https://catalog.test/models']);
    expect(service.getSnapshot()?.warnings).toHaveLength(2);
  });

  test('search results do not alias the snapshot', async () => {
    const { fetchImpl } = fakeFetch(() => jsonResponse(catalogFixture));
    const service = createService(fetchImpl);

    const all = await service.search();
    all.splice(0, all.length);

    expect((await service.search()).map((m) => m.name)).toEqual(['lungmask', 'totalsegmentator', 'fmcib_radiomics']);
    expect(service.getSnapshot()?.models).toHaveLength(3);
  });

  test('concurrent refreshes share one request', async () => {
    const { fetchImpl, urls } = fakeFetch(() => jsonResponse(catalogFixture));
    const service = createService(fetchImpl);

    const [a, b] = await Promise.all([service.refresh(), service.refresh()]);
    expect(a).toBe(b);
    expect(urls).toHaveLength(1);
  });

  test('get finds a model by id or name', async () => {
    const { fetchImpl } = fakeFetch(() => jsonResponse(catalogFixture));
    const service = createService(fetchImpl);

    expect((await service.get('2')).name).toBe('totalsegmentator');
    expect((await service.get('lungmask')).id).toBe('1');
    await expect(service.get('missing')).rejects.toMatchObject({
      kind: 'NotFound',
      message: 'Model not found: missing',
    });
  });

  test('retries transient failures', async () => {
    const { fetchImpl, urls } = fakeFetch((call) => (call === 1 ? jsonResponse({}, 503) : jsonResponse(catalogFixture)));
    const service = createService(fetchImpl);

    const snapshot = await service.refresh();
    expect(snapshot.models).toHaveLength(3);
    expect(urls).toHaveLength(2);
  });

  test('does not retry client errors', async () => {
    const { fetchImpl, urls } = fakeFetch(() => jsonResponse({}, 404));
    const service = createService(fetchImpl);

    await expect(service.refresh()).rejects.toMatchObject({
      kind: 'CatalogUnreachable',
      message: 'Model catalog unreachable: Catalog responded with HTTP 404',
    });
    expect(urls).toHaveLength(1);
  });

  test('keeps the previous snapshot when a refresh fails', async () => {
    const { fetchImpl, urls } = fakeFetch((call) => (call === 1 ? jsonResponse(catalogFixture) : jsonResponse({}, 500)));
    const service = createService(fetchImpl, { maxRetries: 1 });

    const first = await service.refresh();
    await expect(service.refresh()).rejects.toMatchObject({ kind: 'CatalogUnreachable' });
    expect(service.getSnapshot()).toBe(first);
    expect(urls).toHaveLength(3);
  });

  test('refreshes on demand only when no interval is set', () => {
    const { fetchImpl } = fakeFetch(() => jsonResponse(catalogFixture));
    const service = createService(fetchImpl);

    service.start();
    expect(service.isPeriodic).toBe(false);
  });

  test('refreshes periodically when an interval is set', async () => {
    vi.useFakeTimers();
    const { fetchImpl, urls } = fakeFetch(() => jsonResponse(catalogFixture));
    const service = createService(fetchImpl, { refreshIntervalMs: 60000 });

    service.start();
    expect(service.isPeriodic).toBe(true);
    expect(urls).toHaveLength(0);

    await vi.advanceTimersByTimeAsync(60000);
    expect(urls).toHaveLength(1);

    service.stop();
    await vi.advanceTimersByTimeAsync(120000);
    expect(urls).toHaveLength(1);
    expect(service.isPeriodic).toBe(false);
  });

  test('configure with a new url drops the old snapshot', async () => {
    const { fetchImpl, urls } = fakeFetch(() => jsonResponse(catalogFixture));
    const service = createService(fetchImpl);

    await service.refresh();
    service.configure({ url: 'https://mirror.test/models' });
    expect(service.getSnapshot()).toBeNull();

    await service.ensureLoaded();
    expect(urls).toEqual(['https://catalog.test/models', 'https://mirror.test/models']);
  });
});
