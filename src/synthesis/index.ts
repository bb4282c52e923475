export {
  ResponseSynthesizer,
  SECTION_TITLES,
  renderOutput,
  type SynthesisInput,
} from './synthesizer.js';
export { formatMoney, formatNumber, renderResponse } from './render.js';
export type {
  FinalResponse,
  Interruption,
  ResponseSection,
  ResponseStatus,
  SectionStatus,
} from './types.js';
