import type { JsonObject } from '../models/prompt';
import { isJsonObject, objectField, sectionsOf, type Section } from '../models/content';

/**
 * Deep-merge `patch` into `base` and return a new object.
 * - `null` deletes the key (absent keys are a no-op)
 * - object onto object recurses
 * - anything else (scalars, arrays) replaces the base value
 */
export function mergeContent(base: JsonObject, patch: JsonObject): JsonObject {
  const result: JsonObject = { ...base };
  for(const [key, value] of Object.entries(patch)){
    if(value === null){
      delete result[key];
      continue;
    }
    const current = result[key];
    if(isJsonObject(value) && isJsonObject(current)){
      result[key] = mergeContent(current, value);
    } else {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Section-level union of two documents: `overlay` sections replace `base` sections sharing an id,
 * new ids are appended, and variables/metadata are shallow-merged with `overlay` winning.
 */
export function sectionMerge(base: JsonObject, overlay: JsonObject): JsonObject {
  const merged = new Map<string, Section>();
  for(const s of sectionsOf(base)) merged.set(s.id, s);
  for(const s of sectionsOf(overlay)) merged.set(s.id, s);
  return {
    sections: [...merged.values()],
    variables: { ...objectField(base, 'variables'), ...objectField(overlay, 'variables') },
    metadata: { ...objectField(base, 'metadata'), ...objectField(overlay, 'metadata') },
  };
}
