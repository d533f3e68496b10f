// src/common/config/parse.ts
import YAML from 'yaml';

/**
 * Parse configuration text based on file extension.
 * - JSON when path ends with ".json"
 * - YAML otherwise (".yml", ".yaml")
 * Empty YAML documents parse to an empty object.
 */
export const parseText = (p: string, text: string): unknown => {
  if (p.endsWith('.json')) {
    const json: unknown = JSON.parse(text);
    return json;
  }
  const doc: unknown = YAML.parse(text);
  return doc ?? {};
};
