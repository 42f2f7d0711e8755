import { describe, it, expect } from 'vitest';
import { loadConfig } from '../config.js';
import { Dispatcher } from '../dispatcher.js';
import { CapabilityRegistry } from '../registry.js';
import { createResearchPrompts } from './research-prompts.js';

function setup() {
  const registry = new CapabilityRegistry();
  for (const prompt of createResearchPrompts()) {
    registry.register('prompt', prompt);
  }
  registry.seal();
  return new Dispatcher(registry, { config: loadConfig({}, []) });
}

describe('research prompts', () => {
  it('lists both prompts with required arguments', () => {
    const dispatcher = setup();

    expect(dispatcher.listPrompts().map((prompt) => ({
      name: prompt.name,
      arguments: prompt.parameters.map((parameter) => parameter.name)
    }))).toEqual([
      { name: 'research-outline', arguments: ['topic'] },
      { name: 'research-analysis', arguments: ['query', 'findings'] }
    ]);
  });

  it('renders an outline request for the topic', async () => {
    const result = await setup().renderPrompt('research-outline', { topic: 'solid-state batteries' });

    expect(result.success).toBe(true);
    expect(result.payload).toHaveLength(1);
    expect(result.payload?.[0]?.role).toBe('user');
    expect(result.payload?.[0]?.content.split('\n')[0])
      .toBe('Create a comprehensive research outline for the topic: "solid-state batteries"');
  });

  it('embeds the query and findings in the analysis request', async () => {
    const result = await setup().renderPrompt('research-analysis', { query: 'Q1', findings: 'F1\nF2' });

    expect(result.payload?.[0]?.content.split('\n').slice(0, 5)).toEqual([
      'Research Query: Q1',
      '',
      'Research Findings:',
      'F1',
      'F2'
    ]);
  });

  it('requires every declared argument', async () => {
    const result = await setup().renderPrompt('research-analysis', { query: 'Q1' });

    expect(result).toMatchObject({
      success: false,
      error: { kind: 'ValidationError', violations: [{ kind: 'MissingField', field: 'findings' }] }
    });
  });
});
