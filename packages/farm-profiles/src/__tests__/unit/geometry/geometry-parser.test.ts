/**
 * Geometry Parser Tests
 *
 * Dispatch on nesting depth, coordinate validation, ring closure, and
 * idempotent re-parsing of canonical geometries.
 */

import { describe, it, expect } from 'vitest';
import { InvalidGeometryError } from '../../../core/errors.js';
import {
  geometryCenter,
  parseGeometry,
  parseMultiPoint,
  parsePoint,
  parsePolygon,
  toGeoJSON,
} from '../../../geometry/geometry-parser.js';

describe('parseGeometry', () => {
  it('parses a [lat, lon] pair as a point', () => {
    const geometry = parseGeometry([-1.2921, 36.8219]);

    expect(geometry).toEqual({ kind: 'Point', coordinates: { lat: -1.2921, lon: 36.8219 } });
  });

  it('parses a list of pairs as a multipoint', () => {
    const geometry = parseGeometry([
      [1, 2],
      [3, 4],
    ]);

    expect(geometry).toEqual({
      kind: 'MultiPoint',
      coordinates: [
        { lat: 1, lon: 2 },
        { lat: 3, lon: 4 },
      ],
    });
  });

  it('parses a list of rings as a polygon and closes open rings', () => {
    const geometry = parseGeometry([
      [
        [0, 0],
        [0, 1],
        [1, 1],
      ],
    ]);

    expect(geometry.kind).toBe('Polygon');
    if (geometry.kind !== 'Polygon') return;
    expect(geometry.rings).toHaveLength(1);
    expect(geometry.rings[0]).toEqual([
      { lat: 0, lon: 0 },
      { lat: 0, lon: 1 },
      { lat: 1, lon: 1 },
      { lat: 0, lon: 0 },
    ]);
  });

  it('keeps an already closed ring as given', () => {
    const polygon = parsePolygon([
      [
        [0, 0],
        [0, 1],
        [1, 1],
        [0, 0],
      ],
    ]);

    expect(polygon.rings[0]).toHaveLength(4);
  });

  it('returns the same object when given a parsed geometry', () => {
    const geometry = parseGeometry([10, 20]);

    expect(parseGeometry(geometry)).toBe(geometry);
  });

  it('freezes parsed geometries', () => {
    const geometry = parsePoint(10, 20);

    expect(Object.isFrozen(geometry)).toBe(true);
    expect(Object.isFrozen(geometry.coordinates)).toBe(true);
  });

  it('does not treat a look-alike plain object as canonical', () => {
    expect(() => parseGeometry({ kind: 'Point', coordinates: { lat: 1, lon: 2 } })).toThrow(
      InvalidGeometryError
    );
  });

  it.each([
    ['a string', 'invalid'],
    ['null', null],
    ['a number', 42],
    ['an empty list', []],
    ['a single-element list', [1]],
    ['a triple', [1, 2, 3]],
    ['mixed nesting', [[1, 2], 3]],
    ['string coordinates', ['1', '2']],
  ])('rejects %s', (_label, input) => {
    expect(() => parseGeometry(input)).toThrow(InvalidGeometryError);
  });

  it('rejects out-of-range coordinates', () => {
    expect(() => parseGeometry([999, 999])).toThrow('Latitude 999 outside [-90, 90]');
    expect(() => parseGeometry([10, 181])).toThrow('Longitude 181 outside [-180, 180]');
  });

  it('rejects non-finite coordinates', () => {
    expect(() => parseGeometry([Number.NaN, 0])).toThrow(InvalidGeometryError);
    expect(() => parseGeometry([0, Number.POSITIVE_INFINITY])).toThrow(InvalidGeometryError);
  });

  it('carries the raw input on the error', () => {
    try {
      parseGeometry('invalid');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidGeometryError);
      if (error instanceof InvalidGeometryError) {
        expect(error.input).toBe('invalid');
      }
    }
  });
});

describe('variant parsers', () => {
  it('rejects an empty multipoint', () => {
    expect(() => parseMultiPoint([])).toThrow('MultiPoint needs at least one coordinate');
  });

  it('rejects a polygon without rings', () => {
    expect(() => parsePolygon([])).toThrow('Polygon needs an exterior ring');
  });

  it('rejects a ring with fewer than three distinct positions', () => {
    expect(() =>
      parsePolygon([
        [
          [0, 0],
          [1, 1],
        ],
      ])
    ).toThrow('Ring 0 needs at least 3 distinct positions, got 2');
  });
});

describe('toGeoJSON', () => {
  it('swaps to (lon, lat) axis order', () => {
    expect(toGeoJSON(parsePoint(10, 20))).toEqual({ type: 'Point', coordinates: [20, 10] });
  });

  it('converts polygon rings', () => {
    const polygon = parsePolygon([
      [
        [0, 0],
        [0, 2],
        [1, 2],
      ],
    ]);

    expect(toGeoJSON(polygon)).toEqual({
      type: 'Polygon',
      coordinates: [
        [
          [0, 0],
          [2, 0],
          [2, 1],
          [0, 0],
        ],
      ],
    });
  });
});

describe('geometryCenter', () => {
  it('returns a point as (lon, lat)', () => {
    expect(geometryCenter(parsePoint(-1.2921, 36.8219))).toEqual([36.8219, -1.2921]);
  });

  it('averages multipoint positions', () => {
    expect(
      geometryCenter(
        parseMultiPoint([
          [1, 2],
          [3, 4],
        ])
      )
    ).toEqual([3, 2]);
  });

  it('is not pulled toward densely sampled polygon edges', () => {
    const westEdge = Array.from({ length: 12 }, (_, i): [number, number] => [i / 11, 0]);
    const polygon = parsePolygon([[...westEdge, [1, 1], [0, 1], [0, 0]]]);

    const center = geometryCenter(polygon);
    expect(center?.[0]).toBeCloseTo(0.5, 9);
    expect(center?.[1]).toBeCloseTo(0.5, 9);
  });
});
