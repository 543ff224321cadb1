export { PageParser, type ParsedPage } from './PageParser.js';
export { Tokenizer } from './Tokenizer.js';
export { LayoutDetector, INFERENCE_WINDOW } from './LayoutDetector.js';
export { RecordReconstructor, isCompleteEntry } from './RecordReconstructor.js';
