import { describe, it, expect } from 'vitest';
import { DEFAULT_PROJECT_DETAILS, ProjectDetails } from '../schemas/project';
import { RULE_SOURCE } from '../types';
import {
  CONTRADICTORY_INPUT_DETAILS,
  evaluateRules,
  JAMSTACK_RECOMMENDATION,
  UNREALISTIC_SCOPE_DETAILS
} from './rules';

function details(overrides: Partial<ProjectDetails> = {}): ProjectDetails {
  return { ...DEFAULT_PROJECT_DETAILS, team_skills: ['Python'], ...overrides };
}

const staticSite = details({
  project_description: 'Personal portfolio for a photographer',
  budget: 'Low',
  timeline: 'Very Short (Under 1 month)',
  scalability_needs: 'Low'
});

describe('evaluateRules', () => {
  it('returns no verdict for an ordinary project', () => {
    expect(evaluateRules(details())).toEqual({ kind: 'none' });
  });

  describe('static site shortcut', () => {
    it('recommends the JAMstack template', () => {
      const verdict = evaluateRules(staticSite);
      expect(verdict.kind).toBe('direct');
      if (verdict.kind !== 'direct') return;
      expect(verdict.recommendations).toHaveLength(1);
      expect(verdict.recommendations[0].stack_name).toBe(JAMSTACK_RECOMMENDATION.stack_name);
      expect(verdict.recommendations[0].source).toBe(RULE_SOURCE);
    });

    it('matches keywords case-insensitively', () => {
      const verdict = evaluateRules({ ...staticSite, project_description: 'A LANDING PAGE for our app' });
      expect(verdict.kind).toBe('direct');
    });

    it('treats unset scalability like low', () => {
      const verdict = evaluateRules({ ...staticSite, scalability_needs: undefined });
      expect(verdict.kind).toBe('direct');
    });

    it('does not fire when the budget is not low', () => {
      expect(evaluateRules({ ...staticSite, budget: 'Medium' })).toEqual({ kind: 'none' });
    });

    it('does not fire for a short (not very short) timeline', () => {
      expect(evaluateRules({ ...staticSite, timeline: 'Short (1-3 months)' })).toEqual({ kind: 'none' });
    });
  });

  describe('scalability without a backend', () => {
    const contradiction = { kind: 'error', code: 'Contradictory Input', details: CONTRADICTORY_INPUT_DETAILS };

    it('fires when the team has no backend-capable skill', () => {
      expect(evaluateRules(details({ scalability_needs: 'High', team_skills: ['React', 'Vue'] }))).toEqual(contradiction);
    });

    it('fires when team skills are empty', () => {
      expect(evaluateRules(details({ scalability_needs: 'Very High', team_skills: [] }))).toEqual(contradiction);
    });

    it('fires when the team lists None next to a backend skill', () => {
      expect(evaluateRules(details({ scalability_needs: 'High', team_skills: ['Python', 'None'] }))).toEqual(contradiction);
    });

    it('fires when the description rules out a backend', () => {
      expect(
        evaluateRules(details({ scalability_needs: 'High', project_description: 'SPA with no backend at all' }))
      ).toEqual(contradiction);
    });

    it('accepts any backend-capable skill', () => {
      for (const skill of ['Node.js', 'Go', 'C#', 'Java', 'Ruby'] as const) {
        expect(evaluateRules(details({ scalability_needs: 'High', team_skills: [skill] }))).toEqual({ kind: 'none' });
      }
    });

    it('ignores missing backend skills at medium scalability', () => {
      expect(evaluateRules(details({ scalability_needs: 'Medium', team_skills: [] }))).toEqual({ kind: 'none' });
    });
  });

  describe('unrealistic scope', () => {
    const scope = { kind: 'error', code: 'Potentially Unrealistic Scope', details: UNREALISTIC_SCOPE_DETAILS };
    const enterprise = details({
      project_description: 'An enterprise system for payroll',
      timeline: 'Short (1-3 months)',
      budget: 'Medium',
      team_skills: []
    });

    it('fires for complex scope, short timeline and no skills', () => {
      expect(evaluateRules(enterprise)).toEqual(scope);
    });

    it('fires for a low budget even with skills', () => {
      expect(evaluateRules({ ...enterprise, budget: 'Low', team_skills: ['Java'] })).toEqual(scope);
    });

    it('does not fire with skills and a medium budget', () => {
      expect(evaluateRules({ ...enterprise, team_skills: ['Java'] })).toEqual({ kind: 'none' });
    });

    it('does not fire for a medium timeline', () => {
      expect(evaluateRules({ ...enterprise, timeline: 'Medium (3-6 months)' })).toEqual({ kind: 'none' });
    });
  });

  describe('priority', () => {
    it('prefers the static site shortcut over the scope check', () => {
      const verdict = evaluateRules(details({
        project_description: 'landing page for a large scale platform',
        budget: 'Low',
        timeline: 'Very Short (Under 1 month)',
        scalability_needs: 'Low',
        team_skills: []
      }));
      expect(verdict.kind).toBe('direct');
    });

    it('prefers the backend contradiction over the scope check', () => {
      const verdict = evaluateRules(details({
        project_description: 'enterprise system',
        budget: 'Low',
        timeline: 'Short (1-3 months)',
        scalability_needs: 'High',
        team_skills: []
      }));
      expect(verdict).toMatchObject({ kind: 'error', code: 'Contradictory Input' });
    });
  });
});
