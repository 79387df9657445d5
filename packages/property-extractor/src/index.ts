export {
  PropertyExtractionClient,
  type PropertyExtractionClientOptions,
  type PropertyExtractionResult,
} from './core/property-extraction-client';
export {
  ModelCandidateList,
  type CandidateListListener,
} from './core/model-candidate-list';
export {
  CandidatesExhaustedError,
  PropertyExtractionError,
  type CandidateAttempt,
  type CandidateAttemptOutcome,
} from './errors/property-extraction-error';
export { toWesternYear } from './utils/era-converter';
export { extractJsonObject } from './utils/json-extractor';
export { countMeaningfulFields } from './utils/meaningful-fields';
export { PROPERTY_EXTRACTION, ERA_START_YEARS } from './config/constants';
