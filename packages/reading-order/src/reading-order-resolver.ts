import type { LoggerMethods } from '@layoutkit/logger';
import type { AnnotationPath, PathElementMap } from '@layoutkit/model';

import type { AnnotationPage, ReadingOrderResolution } from './types';

import { READING_ORDER } from './config/constants';
import {
  buildPathMappings,
  findPathContainers,
  promoteTableCrossBoundaryReadingOrder,
  resolveReadingOrderConflicts,
  withReadingOrder,
} from './mappings';
import { AnnotationParser } from './parsers';
import { buildContainmentTree, buildGlobalReadingOrder } from './tree';
import { isReadingOrderPath } from './utils';

/**
 * ReadingOrderResolver Options
 */
export interface ReadingOrderResolverOptions {
  /**
   * Logger instance
   */
  logger: LoggerMethods;

  /**
   * Box containment slack (default: READING_ORDER.CONTAINMENT_TOLERANCE)
   */
  containmentTolerance?: number;

  /**
   * Point-to-element slack (default: READING_ORDER.POINT_TOLERANCE)
   */
  pointTolerance?: number;

  /**
   * Table boundary slack (default: READING_ORDER.TABLE_BOUNDARY_TOLERANCE)
   */
  tableBoundaryTolerance?: number;
}

/**
 * ReadingOrderResolver
 *
 * Turns one annotated page into a single reading order:
 * containment tree, path mappings, conflict resolution, table promotion,
 * container discovery and global assembly, in that order.
 */
export class ReadingOrderResolver {
  private readonly logger: LoggerMethods;
  private readonly containmentTolerance: number;
  private readonly pointTolerance: number;
  private readonly tableBoundaryTolerance: number;

  constructor(options: ReadingOrderResolverOptions) {
    this.logger = options.logger;
    this.containmentTolerance =
      options.containmentTolerance ?? READING_ORDER.CONTAINMENT_TOLERANCE;
    this.pointTolerance =
      options.pointTolerance ?? READING_ORDER.POINT_TOLERANCE;
    this.tableBoundaryTolerance =
      options.tableBoundaryTolerance ?? READING_ORDER.TABLE_BOUNDARY_TOLERANCE;
  }

  /**
   * Validate raw input, then resolve it
   *
   * @throws {AnnotationParseError} When the input is not a valid page
   */
  resolveInput(input: unknown): ReadingOrderResolution {
    const page = new AnnotationParser(this.logger).parse(input);
    return this.resolve(page);
  }

  resolve(page: AnnotationPage): ReadingOrderResolution {
    const { elements, paths } = page;
    this.logger.info(
      `[ReadingOrderResolver] Resolving ${elements.length} elements and ${paths.length} paths`,
    );

    const treeRoots = buildContainmentTree(elements, this.containmentTolerance);

    const initial =
      page.mappings ?? buildPathMappings(elements, paths, this.pointTolerance);

    const knownElements = new Set(elements.map((element) => element.id));
    const readingOrder = this.dropUnknownEntries(
      initial.readingOrder,
      paths,
      knownElements,
    );

    const resolved = resolveReadingOrderConflicts(
      readingOrder,
      paths,
      elements,
      { tolerance: this.containmentTolerance },
    );

    const mappings = promoteTableCrossBoundaryReadingOrder(
      withReadingOrder(initial, resolved),
      paths,
      treeRoots,
      this.tableBoundaryTolerance,
    );

    const pathToContainer = findPathContainers(
      paths,
      mappings.readingOrder,
      treeRoots,
      this.containmentTolerance,
    );

    const order = buildGlobalReadingOrder(
      paths,
      mappings.readingOrder,
      pathToContainer,
      treeRoots,
    );

    this.logger.info(
      `[ReadingOrderResolver] Ordered ${order.length} elements from ${Object.keys(mappings.readingOrder).length} reading-order paths`,
    );

    return { treeRoots, mappings, pathToContainer, order };
  }

  private dropUnknownEntries(
    readingOrder: PathElementMap,
    paths: AnnotationPath[],
    knownElements: Set<number>,
  ): PathElementMap {
    const knownPaths = new Set(
      paths.filter(isReadingOrderPath).map((path) => path.id),
    );
    const result: PathElementMap = {};

    for (const [key, elementIds] of Object.entries(readingOrder)) {
      const pathId = Number(key);
      if (!knownPaths.has(pathId)) {
        this.logger.warn(
          `[ReadingOrderResolver] Dropping reading order of path ${pathId}: not a known reading-order path`,
        );
        continue;
      }

      const unknown = elementIds.filter((id) => !knownElements.has(id));
      if (unknown.length > 0) {
        this.logger.warn(
          `[ReadingOrderResolver] Path ${pathId} references unknown elements: ${unknown.join(', ')}`,
        );
      }
      result[pathId] = elementIds.filter((id) => knownElements.has(id));
    }

    return result;
  }
}
