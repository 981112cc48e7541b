import { extractText } from '../models/content';
import { LedgerError } from './errors';
import { logInfo } from './logger';
import type { PromptRegistry } from './promptRegistry';
import type { ResolveStrategy, Resolver } from './resolver';

export type ComponentRole = 'persona' | 'skill' | 'constraint';
/** Pinning needs a per-component version number, which a composition request does not carry. */
export type ComposeStrategy = Exclude<ResolveStrategy, 'pinned'>;

export interface ComposeRequest {
  persona: string;
  skills?: string[];
  constraints?: string[];
  variables?: Record<string, string>;
  branch?: string;
  strategy?: ComposeStrategy;
}

export interface ManifestComponent {
  slug: string;
  type: ComponentRole;
  version: number;
  branch: string;
}

export interface CompositionManifest {
  composedAt: string;
  components: ManifestComponent[];
  variablesApplied: Record<string, string>;
  estimatedTokens: number;
}

export interface CompositionResult {
  prompt: string;
  manifest: CompositionManifest;
  warnings: string[];
}

const PLACEHOLDER = /\{\{(\w+)\}\}/g;
const FORMAT_DIRECTIVE = /\b(?:respond|output)\s+in\s+(json|markdown|plain text|xml|yaml)\b/gi;

export function estimateTokens(text: string): number {
  return Math.floor(text.length / 4);
}

/** Output formats requested by the text, lowercased, in first-seen order. */
export function detectFormats(text: string): string[] {
  const found: string[] = [];
  for(const m of text.matchAll(FORMAT_DIRECTIVE)){
    const format = m[1].toLowerCase();
    if(!found.includes(format)) found.push(format);
  }
  return found;
}

/** Replace `{{name}}` placeholders present in `variables`; report which were applied and which remain. */
export function substituteVariables(text: string, variables: Record<string, string>): { text: string; applied: Record<string, string>; unresolved: string[] } {
  const applied: Record<string, string> = {};
  const unresolved: string[] = [];
  const out = text.replace(PLACEHOLDER, (whole: string, name: string) => {
    if(Object.prototype.hasOwnProperty.call(variables, name)){
      applied[name] = variables[name];
      return variables[name];
    }
    if(!unresolved.includes(name)) unresolved.push(name);
    return whole;
  });
  return { text: out, applied, unresolved };
}

interface ResolvedComponent extends ManifestComponent {
  text: string;
}

/** Assembles persona, skills and constraints (each with inheritance applied) into one prompt. */
export class CompositionEngine {
  constructor(
    private readonly resolver: Resolver,
    private readonly registry: PromptRegistry,
    private readonly defaultBranch: string,
  ){}

  private async resolveComponent(slug: string, type: ComponentRole, branch: string, strategy: ComposeStrategy): Promise<ResolvedComponent> {
    const version = await this.resolver.resolve({ slug, branch, strategy });
    // leaf pinned to the resolved version so text and provenance agree
    const content = await this.registry.getEffectiveContent(slug, branch, version.version);
    return { slug, type, version: version.version, branch, text: extractText(content) };
  }

  async compose(req: ComposeRequest): Promise<CompositionResult> {
    const branch = req.branch ?? this.defaultBranch;
    const strategy = req.strategy ?? 'latest';
    const warnings: string[] = [];

    // persona failure is fatal
    const components: ResolvedComponent[] = [await this.resolveComponent(req.persona, 'persona', branch, strategy)];
    const optional: Array<[string, ComponentRole]> = [
      ...(req.skills ?? []).map((s): [string, ComponentRole] => [s, 'skill']),
      ...(req.constraints ?? []).map((c): [string, ComponentRole] => [c, 'constraint']),
    ];
    for(const [slug, type] of optional){
      try {
        components.push(await this.resolveComponent(slug, type, branch, strategy));
      } catch(e){
        if(!(e instanceof LedgerError)) throw e;
        warnings.push(`Failed to resolve ${type} '${slug}': ${e.message}`);
      }
    }

    const joined = components.map(c => c.text).filter(t => t.length > 0).join('\n\n');
    const { text, applied, unresolved } = substituteVariables(joined, req.variables ?? {});
    if(unresolved.length) warnings.push(`Unresolved variables: ${unresolved.join(', ')}`);

    const formats: string[] = [];
    for(const c of components){
      for(const f of detectFormats(c.text)) if(!formats.includes(f)) formats.push(f);
    }
    if(formats.length > 1) warnings.push(`Conflicting output formats detected: ${formats.join(', ')}`);

    const manifest: CompositionManifest = {
      composedAt: new Date().toISOString(),
      components: components.map(({ slug, type, version, branch: b }) => ({ slug, type, version, branch: b })),
      variablesApplied: applied,
      estimatedTokens: estimateTokens(text),
    };
    logInfo('compose.assembled', {
      persona: req.persona, components: manifest.components.length, warnings: warnings.length, tokens: manifest.estimatedTokens,
    });
    return { prompt: text, manifest, warnings };
  }
}
