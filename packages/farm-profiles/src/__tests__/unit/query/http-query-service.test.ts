/**
 * HTTP Query Service Tests
 *
 * Request bodies sent to the gateway, response validation and mapping of
 * transport failures to RemoteQueryError reasons. fetch is stubbed; nothing
 * leaves the process.
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { RemoteQueryError } from '../../../core/errors.js';
import { HTTPClient } from '../../../core/http-client.js';
import { parsePoint, parsePolygon } from '../../../geometry/geometry-parser.js';
import { HttpQueryService } from '../../../query/http-query-service.js';

const BASE_URL = 'http://gateway.test/v1/';

function mockFetch(status: number, body: string) {
  const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => new Response(body, { status }));
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

function createService(): HttpQueryService {
  return new HttpQueryService({ baseUrl: BASE_URL, client: new HTTPClient({ maxRetries: 0, timeoutMs: 1000 }) });
}

function sentBody(fetchMock: ReturnType<typeof mockFetch>): unknown {
  const init = fetchMock.mock.calls[0][1];
  return typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;
}

async function rejection(promise: Promise<unknown>): Promise<RemoteQueryError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof RemoteQueryError) return error;
    throw error;
  }
  throw new Error('Expected a RemoteQueryError');
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('HttpQueryService.reduceRasterRegion', () => {
  it('posts the image reference and GeoJSON geometry', async () => {
    const fetchMock = mockFetch(200, '{"value": 12.5}');
    const service = createService();
    const collection = service.filterImageCollectionByYear({ kind: 'collection', assetId: 'test/rainfall' }, 2023);

    const value = await service
      .reduceRasterRegion({
        image: { kind: 'composite', collection, band: 'precipitation', method: 'sum' },
        band: 'precipitation',
        geometry: parsePoint(10, 20),
        scale: 5566,
        reducer: 'mean',
      })
      .resolve();

    expect(value).toBe(12.5);
    expect(fetchMock.mock.calls[0][0]).toBe('http://gateway.test/v1/raster/reduce');
    expect(sentBody(fetchMock)).toEqual({
      image: {
        kind: 'composite',
        collection: {
          kind: 'collection',
          assetId: 'test/rainfall',
          dateRange: { start: '2023-01-01', end: '2024-01-01' },
        },
        band: 'precipitation',
        method: 'sum',
      },
      band: 'precipitation',
      geometry: { type: 'Point', coordinates: [20, 10] },
      scale: 5566,
      reducer: 'mean',
      maxPixels: 1e9,
    });
  });

  it('does not contact the gateway until resolved', () => {
    const fetchMock = mockFetch(200, '{"value": 1}');

    createService().reduceRasterRegion({
      image: { kind: 'image', assetId: 'test/dem' },
      band: 'elevation',
      geometry: parsePoint(0, 0),
      scale: 30,
      reducer: 'mean',
    });

    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('passes through a null value', async () => {
    mockFetch(200, '{"value": null}');

    const value = await createService()
      .reduceRasterRegion({
        image: { kind: 'image', assetId: 'test/dem' },
        band: 'elevation',
        geometry: parsePoint(0, 0),
        scale: 30,
        reducer: 'mean',
      })
      .resolve();

    expect(value).toBeNull();
  });

  it.each<[number, string]>([
    [500, 'unreachable'],
    [400, 'rejected'],
  ])('maps HTTP %i to reason %s', async (status, reason) => {
    mockFetch(status, 'failure');

    const error = await rejection(
      createService()
        .reduceRasterRegion({
          image: { kind: 'image', assetId: 'test/dem' },
          band: 'elevation',
          geometry: parsePoint(0, 0),
          scale: 30,
          reducer: 'mean',
        })
        .resolve()
    );

    expect(error.reason).toBe(reason);
    expect(error.operation).toBe('reduceRasterRegion');
  });

  it('reports an unreachable gateway', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => Promise.reject(new Error('connection refused'))));

    const error = await rejection(
      createService()
        .reduceRasterRegion({
          image: { kind: 'image', assetId: 'test/dem' },
          band: 'elevation',
          geometry: parsePoint(0, 0),
          scale: 30,
          reducer: 'mean',
        })
        .resolve()
    );

    expect(error.reason).toBe('unreachable');
  });

  it('rejects a malformed payload', async () => {
    mockFetch(200, '{"value": "twelve"}');

    const error = await rejection(
      createService()
        .reduceRasterRegion({
          image: { kind: 'image', assetId: 'test/dem' },
          band: 'elevation',
          geometry: parsePoint(0, 0),
          scale: 30,
          reducer: 'mean',
        })
        .resolve()
    );

    expect(error.reason).toBe('malformed');
    expect(error.message).toMatch(/^reduceRasterRegion returned an unexpected payload: value: /);
  });

  it('rejects a body that is not JSON', async () => {
    mockFetch(200, 'not json');

    const error = await rejection(
      createService()
        .reduceRasterRegion({
          image: { kind: 'image', assetId: 'test/dem' },
          band: 'elevation',
          geometry: parsePoint(0, 0),
          scale: 30,
          reducer: 'mean',
        })
        .resolve()
    );

    expect(error.reason).toBe('malformed');
  });
});

describe('HttpQueryService.firstIntersectingFeature', () => {
  it('returns the feature properties', async () => {
    const fetchMock = mockFetch(200, '{"feature": {"properties": {"texture": "Clay Loam", "clay": 31}}}');
    const service = createService();

    const feature = await service
      .firstIntersectingFeature({ kind: 'feature-collection', assetId: 'test/soil-texture' }, parsePoint(1, 2))
      .resolve();

    expect(feature).toEqual({ properties: { texture: 'Clay Loam', clay: 31 } });
    expect(fetchMock.mock.calls[0][0]).toBe('http://gateway.test/v1/vector/first-intersecting');
    expect(sentBody(fetchMock)).toEqual({
      collection: 'test/soil-texture',
      geometry: { type: 'Point', coordinates: [2, 1] },
    });
    expect(feature === null ? null : service.featureField(feature, 'texture')).toBe('Clay Loam');
    expect(feature === null ? undefined : service.featureField(feature, 'missing')).toBeNull();
  });

  it('returns null when nothing intersects', async () => {
    mockFetch(200, '{"feature": null}');

    const feature = await createService()
      .firstIntersectingFeature({ kind: 'feature-collection', assetId: 'test/soil-texture' }, parsePoint(1, 2))
      .resolve();

    expect(feature).toBeNull();
  });
});

describe('HttpQueryService local geometry operations', () => {
  it('computes area and centroid without a request', async () => {
    const fetchMock = mockFetch(200, '{}');
    const service = createService();
    const square = parsePolygon([
      [
        [0, 0],
        [0, 1],
        [1, 1],
        [1, 0],
        [0, 0],
      ],
    ]);

    const area = await service.geometryArea(square).resolve();
    const centroid = await service.geometryCentroid(square).resolve();

    expect(area).toBeGreaterThan(12_000_000_000);
    expect(area).toBeLessThan(12_500_000_000);
    expect(centroid).toEqual([0.5, 0.5]);
    expect(await service.geometryArea(parsePoint(5, 5)).resolve()).toBe(0);
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
