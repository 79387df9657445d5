import type { PropertyFields } from './property-fields';

import { z } from 'zod/v4';

const text = z.string().nullish();
const numeric = z.union([z.number(), z.string()]).nullish();
const flag = z.union([z.boolean(), z.string()]).nullish();

const stationSchema = z.looseObject({
  name: z.string(),
  lines: z.array(z.string()).optional(),
  walking_minutes: numeric,
});

/**
 * Shape check for a parsed model response.
 *
 * Every known field is optional and nullable. Numeric fields also accept
 * strings because flyers often print values like `5,800万円`. Keys outside the
 * list are kept.
 */
export const propertyFieldsSchema = z.looseObject({
  property_type: text,
  property_name: text,
  address: text,
  prefecture: text,
  city: text,
  land_rights: text,
  current_status: text,
  handover_date: text,
  build_year: numeric,
  structure: text,
  total_floors: numeric,
  floor_number: numeric,
  room_layout: text,
  orientation: text,
  price: numeric,
  management_fee: numeric,
  repair_fee: numeric,
  exclusive_area: numeric,
  balcony_area: numeric,
  stations: z.array(stationSchema).nullish(),
  parking: flag,
  pet_policy: flag,
  corner_room: flag,
}) satisfies z.ZodType<PropertyFields>;

type FieldName = keyof typeof propertyFieldsSchema.shape;

function isFieldName(key: string): key is FieldName {
  return Object.hasOwn(propertyFieldsSchema.shape, key);
}

/**
 * Turn any parsed JSON object into `PropertyFields`.
 *
 * A known field whose value has the wrong type becomes `null`; the rest of the
 * object is kept. Station entries without a name are dropped.
 */
export function coercePropertyFields(
  raw: Record<string, unknown>,
): PropertyFields {
  const fields: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(raw)) {
    if (key === 'stations' && Array.isArray(value)) {
      fields.stations = value.filter(
        (station) => stationSchema.safeParse(station).success,
      );
    } else if (isFieldName(key)) {
      const schema: z.ZodType = propertyFieldsSchema.shape[key];
      fields[key] = schema.safeParse(value).success ? value : null;
    } else {
      fields[key] = value;
    }
  }

  return propertyFieldsSchema.parse(fields);
}
