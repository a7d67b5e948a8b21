import { SYSTEM_PROMPT, CONTEXT_PLACEHOLDER, DEFAULT_QUERY } from '../prompts/system';
import type { ProjectDetails } from '../schemas/project';
import type { ChatMessage } from '../types';

const FIELD_ORDER: (keyof ProjectDetails)[] = [
  'project_description',
  'app_type',
  'team_skills',
  'budget',
  'timeline',
  'scalability_needs'
];

export function humanizeField(key: string): string {
  return key
    .split('_')
    .filter(Boolean)
    .map(w => w[0].toUpperCase() + w.slice(1))
    .join(' ');
}

function renderValue(details: ProjectDetails, key: keyof ProjectDetails): string {
  switch (key) {
    case 'team_skills':
      return details.team_skills.length ? details.team_skills.join(', ') : 'None specified';
    case 'scalability_needs':
      return details.scalability_needs ?? 'Not specified';
    case 'project_description':
      return details.project_description.trim() || 'Not provided';
    default:
      return details[key];
  }
}

export function summarizeProject(details: ProjectDetails): string {
  return FIELD_ORDER.map(key => `- ${humanizeField(key)}: ${renderValue(details, key)}`).join('\n');
}

export function effectiveQuery(query: string | undefined): string {
  return query?.trim() || DEFAULT_QUERY;
}

export function composePrompt(details: ProjectDetails, query?: string, template: string = SYSTEM_PROMPT): string {
  const summary = summarizeProject(details);
  const instructions = template.split(CONTEXT_PLACEHOLDER).join(summary);
  return [
    'System Instructions:',
    instructions,
    '',
    "User's Current Request/Context:",
    'The overall project context is as follows:',
    summary,
    '',
    `User's specific question for this turn: "${effectiveQuery(query)}"`,
    '',
    'Please provide your recommendations or answer in the specified JSON format.'
  ].join('\n');
}

export function buildMessages(prompt: string, history: readonly ChatMessage[]): ChatMessage[] {
  return [...history, { role: 'user', content: prompt }];
}
