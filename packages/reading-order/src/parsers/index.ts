export { AnnotationParseError } from './annotation-parse-error';
export {
  AnnotationParser,
  createAnnotationElement,
  createAnnotationPath,
} from './annotation-parser';
export type { ParsedAnnotationPage } from './annotation-parser';
export {
  annotationBoxSchema,
  annotationPageSchema,
  annotationPathSchema,
  pointSchema,
} from './annotation-schema';
export type {
  AnnotationBoxInput,
  AnnotationPageInput,
  AnnotationPathInput,
} from './annotation-schema';
