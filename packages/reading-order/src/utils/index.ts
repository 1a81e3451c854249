export { isReadingOrderPath, isTableLabel } from './labels';
