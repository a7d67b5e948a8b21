import { describe, it, expect } from 'vitest';
import { DEFAULT_PROJECT_DETAILS } from '../schemas/project';
import { renderMessage, renderProjectDetails, renderRecommendation, renderResult } from './render';

describe('renderRecommendation', () => {
  it('renders every field', () => {
    expect(renderRecommendation({
      stack_name: 'MERN',
      core_components: ['MongoDB', 'Express'],
      justification: 'Fits the team.',
      pros: ['One language'],
      cons: ['Schema drift'],
      addressed_follow_up: 'Covered hosting.',
      source: 'LLM via OpenAI'
    }, 1)).toBe([
      '#### Recommendation #2: MERN',
      'Source: LLM via OpenAI',
      'Components: MongoDB, Express',
      'Justification:',
      '  Fits the team.',
      'Pros:',
      '  - One language',
      'Cons:',
      '  - Schema drift',
      'Follow-up Addressed: Covered hosting.'
    ].join('\n'));
  });

  it('tolerates missing and mistyped fields', () => {
    expect(renderRecommendation({ stack_name: 'X', pros: 'fast' }, 0)).toBe([
      '#### Recommendation #1: X',
      'Source: AI Agent',
      'Components: N/A',
      'Justification:',
      '  N/A',
      'Pros:',
      '  - N/A',
      'Cons:',
      '  - N/A'
    ].join('\n'));
  });
});

describe('renderResult', () => {
  it('renders errors', () => {
    expect(renderResult({ kind: 'rule_error', code: 'Contradictory Input', details: 'clarify' })).toBe(
      'Rule-Based Check Failed: Contradictory Input - clarify'
    );
    expect(renderResult({ kind: 'model_error', code: 'LLM_NOT_INITIALIZED', details: 'no key' })).toBe(
      'AI Agent Error: LLM_NOT_INITIALIZED - no key'
    );
  });

  it('renders fallbacks with the raw text', () => {
    expect(renderResult({ kind: 'fallback', rawText: 'Use Rails.', details: 'not JSON' })).toBe(
      'AI Response (Fallback): not JSON\nRaw AI Output:\nUse Rails.'
    );
  });

  it('renders non-object entries as plain lines', () => {
    expect(renderResult({ kind: 'recommendations', recommendations: ['Django', { stack_name: 'Rails' }, 3] })).toBe([
      '#### Recommendation #1: Django',
      '---',
      [
        '#### Recommendation #2: Rails',
        'Source: AI Agent',
        'Components: N/A',
        'Justification:',
        '  N/A',
        'Pros:',
        '  - N/A',
        'Cons:',
        '  - N/A'
      ].join('\n'),
      '---',
      '#### Recommendation #3: 3'
    ].join('\n'));
  });

  it('renders an empty result set', () => {
    expect(renderResult({ kind: 'recommendations', recommendations: [] })).toBe('No recommendations were returned.');
  });
});

describe('renderMessage', () => {
  it('prefixes the speaker', () => {
    expect(renderMessage({ role: 'user', content: 'recommend' })).toBe('You> recommend');
  });
});

describe('renderProjectDetails', () => {
  it('lists the current details', () => {
    expect(renderProjectDetails(DEFAULT_PROJECT_DETAILS).split('\n')[0]).toBe('Project Details');
    expect(renderProjectDetails(DEFAULT_PROJECT_DETAILS)).toContain('- Team Skills: None specified');
  });
});
