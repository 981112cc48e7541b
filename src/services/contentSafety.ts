import type { JsonObject } from '../models/prompt';
import { ValidationError } from './errors';

export const SLUG_PATTERN = /^[a-z0-9][a-z0-9-]*[a-z0-9]$/;

const SECRET_PATTERNS: ReadonlyArray<{ name: string; regex: RegExp }> = [
  { name: 'Anthropic API key', regex: /sk-ant-[a-zA-Z0-9-]{20,}/ },
  { name: 'OpenAI API key', regex: /sk-[a-zA-Z0-9]{20,}/ },
  { name: 'GitHub PAT', regex: /ghp_[a-zA-Z0-9]{36}/ },
  { name: 'JWT token', regex: /eyJ[a-zA-Z0-9_-]{50,}/ },
  { name: 'AWS access key', regex: /AKIA[0-9A-Z]{16}/ },
  { name: 'Slack token', regex: /xox[bporas]-[a-zA-Z0-9-]+/ },
];

export function isValidSlug(slug: string): boolean {
  return slug.length >= 2 && slug.length <= 100 && SLUG_PATTERN.test(slug);
}

export function validateSlug(slug: string): void {
  if(!isValidSlug(slug)){
    throw new ValidationError(`Invalid slug '${slug}': use 2-100 lowercase letters, digits and hyphens, starting and ending with a letter or digit`);
  }
}

/** Names of the secret kinds that appear anywhere in the serialized document. */
export function scanForSecrets(content: JsonObject): string[] {
  const text = JSON.stringify(content);
  return SECRET_PATTERNS.filter(p => p.regex.test(text)).map(p => p.name);
}

export function contentByteSize(content: JsonObject): number {
  return Buffer.byteLength(JSON.stringify(content), 'utf8');
}

export function validateContentSize(content: JsonObject, maxBytes: number): void {
  const size = contentByteSize(content);
  if(size > maxBytes){
    throw new ValidationError(`Content is ${size} bytes, over the ${maxBytes} byte limit`, [`size ${size} > ${maxBytes}`]);
  }
}
