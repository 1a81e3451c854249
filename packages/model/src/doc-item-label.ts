/**
 * Document element kinds an annotated region can carry
 */
export const DOC_ITEM_LABELS = [
  'caption',
  'chart',
  'checkbox_selected',
  'checkbox_unselected',
  'code',
  'document_index',
  'empty_value',
  'footnote',
  'form',
  'formula',
  'handwritten_text',
  'key_value_region',
  'list_item',
  'page_footer',
  'page_header',
  'picture',
  'reference',
  'section_header',
  'table',
  'text',
  'title',
] as const;

export type DocItemLabel = (typeof DOC_ITEM_LABELS)[number];

/**
 * Layer an element belongs to.
 * `furniture` holds page headers/footers and similar repeated content.
 */
export const CONTENT_LAYERS = [
  'body',
  'furniture',
  'background',
  'invisible',
  'notes',
] as const;

export type ContentLayer = (typeof CONTENT_LAYERS)[number];
