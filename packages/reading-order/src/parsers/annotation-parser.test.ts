import { beforeEach, describe, expect, test, vi } from 'vitest';

import { AnnotationParseError } from './annotation-parse-error';
import { AnnotationParser, createAnnotationElement } from './annotation-parser';

const box = (overrides: Record<string, unknown> = {}) => ({
  id: 1,
  label: 'text',
  xtl: 0,
  ytl: 0,
  xbr: 100,
  ybr: 50,
  ...overrides,
});

const path = (overrides: Record<string, unknown> = {}) => ({
  id: 10,
  label: 'reading_order',
  points: [
    [10, 10],
    [90, 40],
  ],
  ...overrides,
});

describe('AnnotationParser', () => {
  const logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
  let parser: AnnotationParser;

  beforeEach(() => {
    parser = new AnnotationParser(logger);
  });

  const parseIssues = (input: unknown): string[] => {
    try {
      parser.parse(input);
    } catch (error) {
      if (error instanceof AnnotationParseError) {
        return error.issues;
      }
      throw error;
    }
    throw new Error('Expected parse to fail');
  };

  test('parses elements and paths with defaults applied', () => {
    const result = parser.parse({ elements: [box()], paths: [path()] });

    expect(result.elements).toEqual([
      {
        id: 1,
        label: 'text',
        bbox: { l: 0, t: 0, r: 100, b: 50, coordOrigin: 'TOPLEFT' },
        contentLayer: 'body',
      },
    ]);
    expect(result.paths).toEqual([
      {
        id: 10,
        label: 'reading_order',
        points: [
          [10, 10],
          [90, 40],
        ],
        level: 1,
      },
    ]);
    expect(logger.info).toHaveBeenCalledWith(
      '[AnnotationParser] Parsed 1 elements (0 rotated) and 1 paths',
    );
  });

  test('treats missing collections as empty', () => {
    expect(parser.parse({})).toEqual({ elements: [], paths: [] });
  });

  test('normalizes content layer case', () => {
    const result = parser.parse({
      elements: [box({ contentLayer: 'FURNITURE' })],
    });

    expect(result.elements[0].contentLayer).toBe('furniture');
  });

  test('keeps the drawn box of a rotated element', () => {
    const result = parser.parse({
      elements: [box({ xtl: 30, ytl: 10, xbr: 70, ybr: 90, rotation: 90 })],
    });
    const [element] = result.elements;

    expect(element.rotationDeg).toBe(90);
    expect(element.bboxUnrotated).toEqual({
      l: 30,
      t: 10,
      r: 70,
      b: 90,
      coordOrigin: 'TOPLEFT',
    });
    expect(element.bbox.l).toBeCloseTo(10);
    expect(element.bbox.t).toBeCloseTo(30);
    expect(element.bbox.r).toBeCloseTo(90);
    expect(element.bbox.b).toBeCloseTo(70);
  });

  test('accepts bottom-left boxes whose top edge has the larger y', () => {
    const result = parser.parse({
      elements: [box({ ytl: 80, ybr: 20, coordOrigin: 'BOTTOMLEFT' })],
    });

    expect(result.elements[0].bbox).toEqual({
      l: 0,
      t: 80,
      r: 100,
      b: 20,
      coordOrigin: 'BOTTOMLEFT',
    });
  });

  test('rejects boxes without positive extent', () => {
    expect(parseIssues({ elements: [box({ xbr: 0 })] })).toEqual([
      'elements.0.xbr: Box must have positive width',
    ]);
    expect(parseIssues({ elements: [box({ ybr: -5 })] })).toEqual([
      'elements.0.ybr: Box must have positive height',
    ]);
  });

  test('rejects paths with fewer than two points', () => {
    expect(parseIssues({ paths: [path({ points: [[1, 1]] })] })).toEqual([
      'paths.0.points: Path needs at least 2 points',
    ]);
  });

  test('rejects non-finite coordinates', () => {
    const issues = parseIssues({ elements: [box({ rotation: Infinity })] });

    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^elements\.0\.rotation: /);
  });

  test('rejects unknown labels', () => {
    const issues = parseIssues({ paths: [path({ label: 'zigzag' })] });

    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^paths\.0\.label: /);
  });

  test('rejects duplicate ids', () => {
    expect(
      parseIssues({
        elements: [box(), box({ label: 'title' })],
        paths: [path(), path()],
      }),
    ).toEqual([
      'elements: Duplicate element id 1',
      'paths: Duplicate path id 10',
    ]);
  });

  test('logs and throws a single error listing every issue', () => {
    expect(() =>
      parser.parse({ elements: [box({ xbr: 0 })], paths: [path({ level: 0 })] }),
    ).toThrow(AnnotationParseError);
    expect(logger.error).toHaveBeenCalledWith(
      '[AnnotationParser] Rejected page with 2 issue(s)',
    );
  });
});

describe('createAnnotationElement', () => {
  test('leaves zero rotation unrecorded', () => {
    const element = createAnnotationElement({
      id: 3,
      label: 'picture',
      xtl: 0,
      ytl: 0,
      xbr: 10,
      ybr: 10,
      rotation: 0,
      contentLayer: 'body',
      coordOrigin: 'TOPLEFT',
    });

    expect(element.rotationDeg).toBeUndefined();
    expect(element.bboxUnrotated).toBeUndefined();
  });
});
