import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import type { JsonObject } from '../models/prompt';
import { classifyContent } from '../models/content';
import { logDebug } from './logger';

export type Severity = 'low' | 'medium' | 'high' | 'critical';

export interface ScanFinding {
  patternName: string;
  matchedText: string;
  location: string;
  severity: Severity;
  description: string;
}

export interface ScanResult {
  clean: boolean;
  findings: ScanFinding[];
  riskLevel: Severity;
}

const SEVERITY_RANK: Record<Severity, number> = { low: 0, medium: 1, high: 2, critical: 3 };

const severitySchema = z.enum(['low', 'medium', 'high', 'critical']);
const patternTableSchema = z.object({
  version: z.string(),
  lenientSections: z.array(z.string()),
  families: z.array(z.object({
    id: z.string(),
    patterns: z.array(z.object({
      name: z.string().min(1),
      regex: z.string().min(1),
      severity: severitySchema,
      description: z.string(),
    })),
  })),
  base64Keywords: z.array(z.string()),
  delimiterKeywords: z.array(z.string()),
});
export type PatternTable = z.infer<typeof patternTableSchema>;

interface CompiledPattern {
  name: string;
  regex: RegExp;
  severity: Severity;
  description: string;
}

const PATTERN_FILE = 'injection-patterns.json';
const ZERO_WIDTH = /[\u200b\u200c\u200d\u2060\ufeff]/g;
const BASE64_TOKEN = /[A-Za-z0-9+/]{20,}={0,2}/g;
const CODE_BLOCK = /```[\s\S]*?```/g;
const TAGGED_TEXT = /<[^>]+>([^<]+)<\/[^>]+>/g;

export function maxSeverity(findings: ScanFinding[]): Severity {
  let level: Severity = 'low';
  for(const f of findings){
    if(SEVERITY_RANK[f.severity] > SEVERITY_RANK[level]) level = f.severity;
  }
  return level;
}

/** Read and validate the pattern table; explicit path first, then the data directory next to cwd or the package. */
export function loadPatternTable(explicitPath?: string): PatternTable {
  const candidates = explicitPath ? [explicitPath] : [
    path.join(process.cwd(), 'data', PATTERN_FILE),
    // src/services or dist/services -> ../../data
    path.resolve(__dirname, '..', '..', 'data', PATTERN_FILE),
  ];
  const tried: string[] = [];
  for(const p of candidates){
    if(!fs.existsSync(p)){ tried.push(p); continue; }
    const parsed = patternTableSchema.safeParse(JSON.parse(fs.readFileSync(p, 'utf8')));
    if(!parsed.success){
      throw new Error(`Invalid injection pattern table ${p}: ${parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
    }
    logDebug('scan.patterns_loaded', { path: p, version: parsed.data.version });
    return parsed.data;
  }
  // the scanner gates every commit; it never runs without a table
  throw new Error(`Injection pattern table not found (tried: ${tried.join(', ')})`);
}

/** Pattern-based pre-commit check. Reports only; content is never modified. */
export class InjectionScanner {
  private readonly patterns: CompiledPattern[];
  private readonly lenient: Set<string>;
  private readonly base64Keywords: string[];
  private readonly delimiterKeywords: string[];

  constructor(table: PatternTable){
    this.patterns = table.families.flatMap(f => f.patterns.map(p => ({
      name: p.name,
      regex: new RegExp(p.regex),
      severity: p.severity,
      description: p.description,
    })));
    this.lenient = new Set(table.lenientSections);
    this.base64Keywords = table.base64Keywords;
    this.delimiterKeywords = table.delimiterKeywords;
  }

  static fromFile(explicitPath?: string): InjectionScanner {
    return new InjectionScanner(loadPatternTable(explicitPath));
  }

  scan(document: JsonObject): ScanResult {
    const findings: ScanFinding[] = [];
    for(const leaf of classifyContent(document).textLeaves()){
      let leafFindings = this.scanText(leaf.text, leaf.location);
      if(leaf.sectionId !== undefined && this.lenient.has(leaf.sectionId)){
        leafFindings = leafFindings.filter(f => f.severity === 'critical');
      }
      findings.push(...leafFindings);
    }
    return { clean: findings.length === 0, findings, riskLevel: maxSeverity(findings) };
  }

  scanText(text: string, location = 'text'): ScanFinding[] {
    const findings: ScanFinding[] = [];
    const lower = text.toLowerCase();
    for(const p of this.patterns){
      const m = p.regex.exec(lower);
      if(m) findings.push({ patternName: p.name, matchedText: m[0], location, severity: p.severity, description: p.description });
    }
    findings.push(...this.encodingTricks(text, location));
    findings.push(...this.delimiterAttacks(text, location));
    return findings;
  }

  private encodingTricks(text: string, location: string): ScanFinding[] {
    const findings: ScanFinding[] = [];
    const zeroWidth = text.match(ZERO_WIDTH);
    if(zeroWidth){
      findings.push({
        patternName: 'zero_width_chars',
        matchedText: `Found ${zeroWidth.length} zero-width character(s)`,
        location,
        severity: 'medium',
        description: 'Zero-width characters detected; may hide injected content',
      });
    }
    for(const token of text.match(BASE64_TOKEN) ?? []){
      // only well-padded tokens decode
      if(token.length % 4 !== 0) continue;
      const decoded = Buffer.from(token, 'base64').toString('utf8').toLowerCase();
      if(this.base64Keywords.some(k => decoded.includes(k))){
        findings.push({
          patternName: 'base64_injection',
          matchedText: `${token.slice(0, 40)}...`,
          location,
          severity: 'high',
          description: 'Base64-encoded suspicious content detected',
        });
      }
    }
    return findings;
  }

  private delimiterAttacks(text: string, location: string): ScanFinding[] {
    const findings: ScanFinding[] = [];
    for(const block of text.match(CODE_BLOCK) ?? []){
      const inner = block.replace(/^`+|`+$/g, '').toLowerCase();
      if(this.delimiterKeywords.some(k => inner.includes(k))){
        findings.push({
          patternName: 'code_block_injection',
          matchedText: `${block.slice(0, 60)}...`,
          location,
          severity: 'high',
          description: 'Instructions hidden in code block',
        });
      }
    }
    for(const m of text.matchAll(TAGGED_TEXT)){
      const inner = m[1];
      if(this.delimiterKeywords.some(k => inner.toLowerCase().includes(k))){
        findings.push({
          patternName: 'tag_injection',
          matchedText: inner.slice(0, 60),
          location,
          severity: 'high',
          description: 'Instructions hidden in XML/HTML tags',
        });
      }
    }
    return findings;
  }
}
