export {
  bboxArea,
  bboxHeight,
  bboxVerticalRange,
  bboxVisualTop,
  bboxWidth,
  containsAllPoints,
  containsBBox,
  containsPoint,
} from './bbox-utils';
export { bboxEnclosingRotatedRect } from './rotated-bbox';
