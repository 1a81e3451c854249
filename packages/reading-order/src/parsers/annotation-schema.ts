import { CONTENT_LAYERS, DOC_ITEM_LABELS, PATH_LABELS } from '@layoutkit/model';
import { z } from 'zod';

const coordinateSchema = z.number().finite();

/** Zod schema for a point: [x, y] */
export const pointSchema = z.tuple([coordinateSchema, coordinateSchema]);

/**
 * Zod schema for a drawn box.
 *
 * Corners follow the annotation tool: (xtl, ytl) is the top-left corner and
 * (xbr, ybr) the bottom-right one. On a bottom-left page the top edge has the
 * larger y.
 */
export const annotationBoxSchema = z
  .object({
    id: z.number().int().nonnegative(),
    label: z.enum(DOC_ITEM_LABELS),
    xtl: coordinateSchema,
    ytl: coordinateSchema,
    xbr: coordinateSchema,
    ybr: coordinateSchema,
    rotation: coordinateSchema.optional(),
    contentLayer: z
      .string()
      .transform((value) => value.toLowerCase())
      .pipe(z.enum(CONTENT_LAYERS))
      .default('body'),
    coordOrigin: z.enum(['TOPLEFT', 'BOTTOMLEFT']).default('TOPLEFT'),
  })
  .superRefine((box, ctx) => {
    if (box.xbr <= box.xtl) {
      ctx.addIssue({
        code: 'custom',
        path: ['xbr'],
        message: 'Box must have positive width',
      });
    }
    const height =
      box.coordOrigin === 'TOPLEFT' ? box.ybr - box.ytl : box.ytl - box.ybr;
    if (height <= 0) {
      ctx.addIssue({
        code: 'custom',
        path: ['ybr'],
        message: 'Box must have positive height',
      });
    }
  });

/** Zod schema for a drawn path */
export const annotationPathSchema = z.object({
  id: z.number().int().nonnegative(),
  label: z.enum(PATH_LABELS),
  points: z.array(pointSchema).min(2, 'Path needs at least 2 points'),
  level: z.number().int().min(1).default(1),
});

const findDuplicateIds = (items: { id: number }[]): number[] => {
  const seen = new Set<number>();
  const duplicates = new Set<number>();
  for (const item of items) {
    if (seen.has(item.id)) {
      duplicates.add(item.id);
    }
    seen.add(item.id);
  }
  return [...duplicates];
};

/** Zod schema for one annotated page */
export const annotationPageSchema = z
  .object({
    elements: z.array(annotationBoxSchema).default([]),
    paths: z.array(annotationPathSchema).default([]),
  })
  .superRefine((page, ctx) => {
    for (const id of findDuplicateIds(page.elements)) {
      ctx.addIssue({
        code: 'custom',
        path: ['elements'],
        message: `Duplicate element id ${id}`,
      });
    }
    for (const id of findDuplicateIds(page.paths)) {
      ctx.addIssue({
        code: 'custom',
        path: ['paths'],
        message: `Duplicate path id ${id}`,
      });
    }
  });

export type AnnotationBoxInput = z.infer<typeof annotationBoxSchema>;
export type AnnotationPathInput = z.infer<typeof annotationPathSchema>;
export type AnnotationPageInput = z.infer<typeof annotationPageSchema>;
