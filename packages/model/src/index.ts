export type {
  Document,
  LlmStatus,
  OcrStatus,
  PipelineStage,
} from './document';
export {
  PROPERTY_FIELD_NAMES,
  type PropertyFieldName,
  type PropertyFields,
  type StationAccess,
} from './property-fields';
export {
  coercePropertyFields,
  propertyFieldsSchema,
} from './property-fields-schema';
export type { Task } from './task';
