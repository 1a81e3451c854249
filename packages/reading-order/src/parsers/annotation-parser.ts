import type { LoggerMethods } from '@layoutkit/logger';
import type {
  AnnotationElement,
  AnnotationPath,
  BoundingBox,
  Point,
} from '@layoutkit/model';

import type {
  AnnotationBoxInput,
  AnnotationPathInput,
} from './annotation-schema';

import { bboxEnclosingRotatedRect } from '../geometry';
import { AnnotationParseError } from './annotation-parse-error';
import { annotationPageSchema } from './annotation-schema';

/**
 * Validated page content
 */
export interface ParsedAnnotationPage {
  elements: AnnotationElement[];
  paths: AnnotationPath[];
}

/**
 * Build an element from a validated box.
 *
 * A rotated box keeps the drawn rectangle in `bboxUnrotated` and gets the
 * enclosing axis-aligned box as `bbox`; an unrotated one uses the drawn
 * rectangle directly.
 */
export function createAnnotationElement(
  box: AnnotationBoxInput,
): AnnotationElement {
  const drawn: BoundingBox = {
    l: box.xtl,
    t: box.ytl,
    r: box.xbr,
    b: box.ybr,
    coordOrigin: box.coordOrigin,
  };

  const element: AnnotationElement = {
    id: box.id,
    label: box.label,
    bbox: drawn,
    contentLayer: box.contentLayer,
  };

  if (box.rotation === undefined || box.rotation === 0) {
    return element;
  }

  return {
    ...element,
    bbox: bboxEnclosingRotatedRect(drawn, box.rotation),
    rotationDeg: box.rotation,
    bboxUnrotated: drawn,
  };
}

export function createAnnotationPath(
  path: AnnotationPathInput,
): AnnotationPath {
  return {
    id: path.id,
    label: path.label,
    points: path.points.map(([x, y]): Point => [x, y]),
    level: path.level,
  };
}

/**
 * AnnotationParser
 *
 * Validates raw page annotations (already decoded from the annotation tool's
 * export) and turns them into elements and paths.
 */
export class AnnotationParser {
  private readonly logger: LoggerMethods;

  constructor(logger: LoggerMethods) {
    this.logger = logger;
  }

  /**
   * @throws {AnnotationParseError} When the input does not describe a valid page
   */
  parse(input: unknown): ParsedAnnotationPage {
    const result = annotationPageSchema.safeParse(input);

    if (!result.success) {
      const issues = result.error.issues.map(
        (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
      );
      this.logger.error(
        `[AnnotationParser] Rejected page with ${issues.length} issue(s)`,
      );
      throw new AnnotationParseError(
        `Invalid annotation page: ${issues.join('; ')}`,
        issues,
        { cause: result.error },
      );
    }

    const elements = result.data.elements.map(createAnnotationElement);
    const paths = result.data.paths.map(createAnnotationPath);

    const rotated = elements.filter((e) => e.rotationDeg !== undefined).length;
    this.logger.info(
      `[AnnotationParser] Parsed ${elements.length} elements (${rotated} rotated) and ${paths.length} paths`,
    );

    return { elements, paths };
  }
}
