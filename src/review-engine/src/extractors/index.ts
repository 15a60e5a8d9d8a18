export {
  PatternExtractor,
  PatternExtraction,
  DEFAULT_INDENTATION,
  DEFAULT_PREFERRED_MAX,
  DEFAULT_AVERAGE_LINE_LENGTH,
} from './PatternExtractor';
export { Counter } from './Counter';
