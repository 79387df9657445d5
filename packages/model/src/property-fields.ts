/**
 * A station reachable on foot from the property
 */
export interface StationAccess {
  name: string;
  lines?: string[];
  /**
   * Usually a number; models sometimes copy the printed form, e.g. `5分`
   */
  walking_minutes?: number | string | null;
  [key: string]: unknown;
}

/**
 * Structured fields extracted from a real-estate flyer.
 *
 * Every field is optional and nullable because models omit what they cannot
 * find. Unknown keys returned by a model are kept as-is.
 */
export interface PropertyFields {
  property_type?: string | null;
  property_name?: string | null;
  address?: string | null;
  prefecture?: string | null;
  city?: string | null;
  land_rights?: string | null;
  current_status?: string | null;
  handover_date?: string | null;
  build_year?: number | string | null;
  structure?: string | null;
  total_floors?: number | string | null;
  floor_number?: number | string | null;
  room_layout?: string | null;
  orientation?: string | null;
  price?: number | string | null;
  management_fee?: number | string | null;
  repair_fee?: number | string | null;
  exclusive_area?: number | string | null;
  balcony_area?: number | string | null;
  stations?: StationAccess[] | null;
  parking?: boolean | string | null;
  pet_policy?: boolean | string | null;
  corner_room?: boolean | string | null;
  [key: string]: unknown;
}

/**
 * Names of the fields requested from the model, in prompt order
 */
export const PROPERTY_FIELD_NAMES = [
  'property_type',
  'property_name',
  'address',
  'prefecture',
  'city',
  'land_rights',
  'current_status',
  'handover_date',
  'build_year',
  'structure',
  'total_floors',
  'floor_number',
  'room_layout',
  'orientation',
  'price',
  'management_fee',
  'repair_fee',
  'exclusive_area',
  'balcony_area',
  'stations',
  'parking',
  'pet_policy',
  'corner_room',
] as const;

export type PropertyFieldName = (typeof PROPERTY_FIELD_NAMES)[number];
