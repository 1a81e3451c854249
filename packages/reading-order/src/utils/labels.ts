import type { AnnotationPath, DocItemLabel } from '@layoutkit/model';

const TABLE_LABELS: ReadonlySet<DocItemLabel> = new Set<DocItemLabel>([
  'table',
  'document_index',
]);

/**
 * Whether elements with this label are tables for cross-boundary promotion
 */
export function isTableLabel(label: DocItemLabel): boolean {
  return TABLE_LABELS.has(label);
}

export function isReadingOrderPath(path: AnnotationPath): boolean {
  return path.label === 'reading_order';
}
