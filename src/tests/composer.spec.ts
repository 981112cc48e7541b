import { describe, it, expect } from 'vitest';
import { detectFormats, estimateTokens, substituteVariables } from '../services/composer';
import { NotFoundError } from '../services/errors';
import { createTestLedger, sectioned } from './ledgerFixture';

async function library() {
  const ledger = createTestLedger();
  await ledger.registry.createPrompt({
    slug: 'analyst', name: 'Analyst', type: 'persona',
    content: sectioned({ identity: 'You are a {{role}}.', format: 'Respond in JSON.' }),
  });
  await ledger.registry.createPrompt({
    slug: 'summarize', name: 'Summarize', type: 'skill',
    content: sectioned({ body: 'Output in markdown for {{audience}}.' }),
  });
  await ledger.registry.createPrompt({ slug: 'brief', name: 'Brief', type: 'constraint', content: sectioned({ rule: 'Keep it short.' }) });
  return ledger;
}

describe('CompositionEngine', () => {
  it('assembles components in order with a manifest and warnings', async () => {
    const { composer } = await library();
    const result = await composer.compose({
      persona: 'analyst', skills: ['summarize', 'missing-skill'], constraints: ['brief'], variables: { role: 'data analyst' },
    });

    expect(result.prompt).toBe('You are a data analyst.\n\nRespond in JSON.\n\nOutput in markdown for {{audience}}.\n\nKeep it short.');
    expect(result.warnings).toEqual([
      "Failed to resolve skill 'missing-skill': Prompt 'missing-skill' not found",
      'Unresolved variables: audience',
      'Conflicting output formats detected: json, markdown',
    ]);
    expect(result.manifest.components).toEqual([
      { slug: 'analyst', type: 'persona', version: 1, branch: 'main' },
      { slug: 'summarize', type: 'skill', version: 1, branch: 'main' },
      { slug: 'brief', type: 'constraint', version: 1, branch: 'main' },
    ]);
    expect(result.manifest.variablesApplied).toEqual({ role: 'data analyst' });
    expect(result.manifest.estimatedTokens).toBe(23);
  });

  it('warns when components ask for different output formats', async () => {
    const { composer, registry } = createTestLedger();
    await registry.createPrompt({ slug: 'narrator', name: 'Narrator', type: 'persona', content: sectioned({ style: 'Respond in JSON format.' }) });
    await registry.createPrompt({ slug: 'formatter', name: 'Formatter', type: 'skill', content: sectioned({ style: 'Respond in markdown format.' }) });
    const result = await composer.compose({ persona: 'narrator', skills: ['formatter'] });
    expect(result.warnings).toEqual(['Conflicting output formats detected: json, markdown']);
  });

  it('takes the text of documents without sections', async () => {
    const { composer, registry } = createTestLedger();
    await registry.createPrompt({ slug: 'narrator', name: 'Narrator', type: 'persona', content: { text: 'Respond in JSON.' } });
    await registry.createPrompt({ slug: 'formatter', name: 'Formatter', type: 'skill', content: { text: 'Respond in markdown.' } });
    await registry.createPrompt({
      slug: 'tidy', name: 'Tidy', type: 'constraint', content: { rule: 'No filler.', detail: { tone: 'plain' } },
    });
    const result = await composer.compose({ persona: 'narrator', skills: ['formatter'], constraints: ['tidy'] });
    expect(result.prompt).toBe('Respond in JSON.\n\nRespond in markdown.\n\nNo filler.\n\nplain');
    expect(result.warnings).toEqual(['Conflicting output formats detected: json, markdown']);
  });

  it('fails when the persona cannot be resolved', async () => {
    const { composer } = await library();
    await expect(composer.compose({ persona: 'ghost', skills: ['summarize'] })).rejects.toBeInstanceOf(NotFoundError);
  });

  it('applies inheritance to each component', async () => {
    const { composer, registry } = await library();
    await registry.createPrompt({
      slug: 'senior-analyst', name: 'Senior', type: 'persona', parentSlug: 'analyst',
      content: sectioned({ identity: 'You are a senior {{role}}.' }),
    });
    const result = await composer.compose({ persona: 'senior-analyst', variables: { role: 'auditor' } });
    expect(result.prompt).toBe('You are a senior auditor.\n\nRespond in JSON.');
    expect(result.warnings).toEqual([]);
  });

  it('uses the best performing persona version when asked', async () => {
    const { composer, registry, versions, usage } = await library();
    const analyst = await registry.requirePrompt('analyst');
    const v1 = await versions.head(analyst.id);
    if(!v1) throw new Error('fixture: analyst has no head');
    await versions.commit(analyst.id, { content: sectioned({ identity: 'You are an {{role}}.', format: 'Respond in JSON.' }) });
    for(let i = 0; i < 3; i++) await usage.record({ promptId: analyst.id, versionId: v1.id, outcome: 'success' });

    const result = await composer.compose({ persona: 'analyst', strategy: 'best_performing', variables: { role: 'editor' } });
    expect(result.manifest.components).toEqual([{ slug: 'analyst', type: 'persona', version: 1, branch: 'main' }]);
    expect(result.prompt).toBe('You are a editor.\n\nRespond in JSON.');
  });
});

describe('composition helpers', () => {
  it('detects distinct formats in first-seen order', () => {
    expect(detectFormats('Respond in YAML. Then output in json, and respond in yaml again.')).toEqual(['yaml', 'json']);
    expect(detectFormats('No directives here.')).toEqual([]);
  });

  it('substitutes known placeholders and lists the rest once', () => {
    expect(substituteVariables('{{a}} {{b}} {{a}} {{c}} {{c}}', { a: 'x' })).toEqual({
      text: 'x {{b}} x {{c}} {{c}}',
      applied: { a: 'x' },
      unresolved: ['b', 'c'],
    });
  });

  it('estimates four characters per token', () => {
    expect(estimateTokens('')).toBe(0);
    expect(estimateTokens('abcdefg')).toBe(1);
    expect(estimateTokens('abcdefgh')).toBe(2);
  });
});
