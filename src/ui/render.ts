import { summarizeProject } from '../engine/buildMessages';
import type { ProjectDetails } from '../schemas/project';
import { isRecommendationItem, DisplayMessage, PipelineResult, RecommendationEntry, RecommendationItem } from '../types';

function text(value: unknown, fallback = 'N/A'): string {
  return typeof value === 'string' && value.trim() ? value : fallback;
}

function list(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

function bullets(items: string[]): string[] {
  return items.length ? items.map(i => `  - ${i}`) : ['  - N/A'];
}

export function renderRecommendation(rec: RecommendationItem, index: number): string {
  const components = list(rec.core_components);
  const lines = [
    `#### Recommendation #${index + 1}: ${text(rec.stack_name)}`,
    `Source: ${text(rec.source, 'AI Agent')}`,
    `Components: ${components.length ? components.join(', ') : 'N/A'}`,
    'Justification:',
    `  ${text(rec.justification)}`,
    'Pros:',
    ...bullets(list(rec.pros)),
    'Cons:',
    ...bullets(list(rec.cons))
  ];
  if (typeof rec.addressed_follow_up === 'string' && rec.addressed_follow_up) {
    lines.push(`Follow-up Addressed: ${rec.addressed_follow_up}`);
  }
  return lines.join('\n');
}

export function renderEntry(entry: RecommendationEntry, index: number): string {
  if (isRecommendationItem(entry)) return renderRecommendation(entry, index);
  return `#### Recommendation #${index + 1}: ${typeof entry === 'string' ? entry : JSON.stringify(entry)}`;
}

export function renderResult(result: PipelineResult): string {
  switch (result.kind) {
    case 'recommendations':
      if (result.recommendations.length === 0) return 'No recommendations were returned.';
      return result.recommendations.map(renderEntry).join('\n---\n');
    case 'rule_error':
      return `Rule-Based Check Failed: ${result.code} - ${result.details}`;
    case 'model_error':
      return `AI Agent Error: ${result.code} - ${result.details}`;
    case 'fallback':
      return `AI Response (Fallback): ${result.details}\nRaw AI Output:\n${result.rawText}`;
  }
}

export function renderMessage(message: DisplayMessage): string {
  const body = typeof message.content === 'string' ? message.content : renderResult(message.content);
  return `${message.role === 'user' ? 'You' : 'Advisor'}> ${body}`;
}

export function renderProjectDetails(details: ProjectDetails): string {
  return `Project Details\n${summarizeProject(details)}`;
}
