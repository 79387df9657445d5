import { isPlainObject } from '@propscan/shared';

import { PropertyExtractionError } from '../errors/property-extraction-error';

/**
 * Parse the JSON object embedded in a model response.
 *
 * Takes the text between the first `{` and the last `}` so that prose or
 * code fences around the object are ignored.
 *
 * @throws PropertyExtractionError when no object can be parsed
 */
export function extractJsonObject(text: string): Record<string, unknown> {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');

  if (start === -1 || end <= start) {
    throw new PropertyExtractionError('No JSON object found in response');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text.slice(start, end + 1));
  } catch (error) {
    throw PropertyExtractionError.fromError('Invalid JSON in response', error);
  }

  if (!isPlainObject(parsed)) {
    throw new PropertyExtractionError('Response JSON is not an object');
  }
  return parsed;
}
