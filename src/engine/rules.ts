import type { ProjectDetails } from '../schemas/project';
import { RULE_SOURCE, Recommendation, RuleVerdict } from '../types';

const STATIC_SITE_KEYWORDS = ['static site', 'brochure website', 'portfolio', 'landing page'];
const COMPLEX_SCOPE_KEYWORDS = ['enterprise system', 'large scale platform', 'many complex features'];
const BACKEND_SKILLS = ['node.js', 'python', 'java', 'go', 'ruby', 'php', 'c#'];

export const JAMSTACK_RECOMMENDATION: Recommendation = {
  stack_name: 'JAMstack (e.g., Astro / Eleventy / Hugo / Next.js static export)',
  core_components: ['Static Site Generator', 'CDN (Netlify, Vercel, GitHub Pages)'],
  justification:
    'For simple, static content with low budget and fast timeline, JAMstack offers optimal performance, security, and low cost.',
  pros: ['Excellent performance', 'High security', 'Low hosting costs', 'Good developer experience'],
  cons: [
    'Not suitable for dynamic server-side logic without workarounds (serverless functions)',
    'Build times can increase for very large sites'
  ],
  source: RULE_SOURCE
};

export const CONTRADICTORY_INPUT_DETAILS =
  'High scalability typically requires a robust backend. Please clarify if a backend is needed or adjust scalability expectations.';
export const UNREALISTIC_SCOPE_DETAILS =
  'A complex project with a very short timeline and limited budget/expertise is challenging. Consider adjusting scope, timeline, or budget.';

interface NormalizedDetails {
  appType: string;
  description: string;
  scalability: string;
  budget: string;
  timeline: string;
  skills: string[];
}

function normalize(details: ProjectDetails): NormalizedDetails {
  return {
    appType: details.app_type.toLowerCase(),
    description: details.project_description.toLowerCase(),
    scalability: (details.scalability_needs ?? '').toLowerCase(),
    budget: details.budget.toLowerCase(),
    timeline: details.timeline.toLowerCase(),
    skills: details.team_skills.map(s => s.toLowerCase())
  };
}

function lacksBackendSkill(skills: string[]): boolean {
  return skills.includes('none') || !skills.some(s => BACKEND_SKILLS.includes(s));
}

type Rule = (d: NormalizedDetails) => RuleVerdict | null;

const staticSiteShortcut: Rule = d => {
  const keywordHit = STATIC_SITE_KEYWORDS.some(k => d.appType.includes(k) || d.description.includes(k));
  if (
    keywordHit &&
    (d.scalability === 'low' || d.scalability === '') &&
    d.budget === 'low' &&
    d.timeline.startsWith('very short')
  ) {
    return { kind: 'direct', recommendations: [structuredClone(JAMSTACK_RECOMMENDATION)] };
  }
  return null;
};

const scalabilityWithoutBackend: Rule = d => {
  if (
    (d.scalability === 'high' || d.scalability === 'very high') &&
    (d.description.includes('no backend') || d.appType.includes('frontend only') || lacksBackendSkill(d.skills))
  ) {
    return { kind: 'error', code: 'Contradictory Input', details: CONTRADICTORY_INPUT_DETAILS };
  }
  return null;
};

const unrealisticScope: Rule = d => {
  if (
    COMPLEX_SCOPE_KEYWORDS.some(k => d.description.includes(k)) &&
    (d.timeline.startsWith('very short') || d.timeline.startsWith('short')) &&
    (d.budget === 'low' || d.skills.length === 0 || d.skills.includes('none'))
  ) {
    return { kind: 'error', code: 'Potentially Unrealistic Scope', details: UNREALISTIC_SCOPE_DETAILS };
  }
  return null;
};

// Priority order; the first rule that returns a verdict wins.
const RULES: readonly Rule[] = [staticSiteShortcut, scalabilityWithoutBackend, unrealisticScope];

export function evaluateRules(details: ProjectDetails): RuleVerdict {
  const d = normalize(details);
  for (const rule of RULES) {
    const verdict = rule(d);
    if (verdict) return verdict;
  }
  return { kind: 'none' };
}
