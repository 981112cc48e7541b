import type { JsonObject } from './prompt';

export interface Section {
  id: string;
  label?: string;
  content?: string;
  [extra: string]: unknown;
}

/** A string reachable inside a document, with the dotted path it was found at. */
export interface TextLeaf {
  location: string;
  text: string;
  sectionId?: string;
}

/** Capabilities every content shape offers to diff, guard and scan code. */
interface ContentView {
  readonly raw: JsonObject;
  topLevelKeys(): string[];
  textLeaves(): TextLeaf[];
}

export interface SectionedContent extends ContentView {
  readonly kind: 'sectioned';
  readonly sections: Section[];
  readonly variables: JsonObject;
  readonly metadata: JsonObject;
}

export interface FlatContent extends ContentView {
  readonly kind: 'flat';
}

export type PromptContent = SectionedContent | FlatContent;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Object-valued field of a document, or an empty object when absent or not an object. */
export function objectField(doc: JsonObject, key: string): JsonObject {
  const v = doc[key];
  return isJsonObject(v) ? v : {};
}

/** Sections of a document; lenient about malformed entries (anything without a string id is skipped). */
export function sectionsOf(doc: JsonObject): Section[] {
  const raw = doc.sections;
  if(!Array.isArray(raw)) return [];
  const out: Section[] = [];
  for(const s of raw){
    if(isJsonObject(s) && typeof s.id === 'string'){
      out.push({ ...s, id: s.id });
    }
  }
  return out;
}

export function sectionText(section: Section): string {
  return typeof section.content === 'string' ? section.content : '';
}

/** Sections keyed by id, keeping first-seen order (later duplicates overwrite earlier ones). */
export function sectionMap(doc: JsonObject): Map<string, Section> {
  const map = new Map<string, Section>();
  for(const s of sectionsOf(doc)) map.set(s.id, s);
  return map;
}

function collectStrings(value: unknown, location: string, out: TextLeaf[]): void {
  if(typeof value === 'string'){
    out.push({ location, text: value });
  } else if(Array.isArray(value)){
    value.forEach((v, i) => collectStrings(v, `${location}.${i}`, out));
  } else if(isJsonObject(value)){
    for(const [k, v] of Object.entries(value)) collectStrings(v, location ? `${location}.${k}` : k, out);
  }
}

/** A document is sectioned when it carries a `sections` array; malformed entries inside it are skipped. */
export function classifyContent(doc: JsonObject): PromptContent {
  if(Array.isArray(doc.sections)){
    const sections = sectionsOf(doc);
    const variables = objectField(doc, 'variables');
    const metadata = objectField(doc, 'metadata');
    return {
      kind: 'sectioned',
      raw: doc,
      sections,
      variables,
      metadata,
      topLevelKeys: () => Object.keys(doc),
      textLeaves: () => {
        const leaves: TextLeaf[] = sections.map(s => ({ location: `sections.${s.id}`, text: sectionText(s), sectionId: s.id }));
        for(const [key, value] of Object.entries(variables)){
          if(typeof value === 'string') leaves.push({ location: `variables.${key}`, text: value });
        }
        return leaves;
      }
    };
  }
  return {
    kind: 'flat',
    raw: doc,
    topLevelKeys: () => Object.keys(doc),
    textLeaves: () => {
      const leaves: TextLeaf[] = [];
      collectStrings(doc, '', leaves);
      return leaves;
    }
  };
}

/** Serialized size used by every size comparison (diff lengths, reduction percentages, limits). */
export function jsonSize(value: unknown): number {
  const s = JSON.stringify(value);
  return typeof s === 'string' ? s.length : 0;
}

const LAYER_KEYS = new Set(['sections', 'variables', 'metadata']);

/**
 * Plain text of a document: section texts joined by a blank line, else `text`, else its string leaves.
 * The layering containers (`sections`, `variables`, `metadata`) never count as leaves of a flat body.
 */
export function extractText(doc: JsonObject): string {
  const sections = sectionsOf(doc);
  if(sections.length > 0){
    return sections.map(sectionText).filter(t => t.length > 0).join('\n\n');
  }
  if(typeof doc.text === 'string') return doc.text;
  const leaves: TextLeaf[] = [];
  for(const [key, value] of Object.entries(doc)){
    if(!LAYER_KEYS.has(key)) collectStrings(value, key, leaves);
  }
  return leaves.map(l => l.text).filter(t => t.length > 0).join('\n\n');
}
