import type { ProjectDetails } from './schemas/project';
import type { MemoryWindow } from './state/memory';

export const RULE_SOURCE = 'Rule-Based Pre-check';
export const MODEL_SOURCE = 'LLM via OpenAI';
export type RecommendationSource = typeof RULE_SOURCE | typeof MODEL_SOURCE;

export type Recommendation = {
  stack_name: string;
  core_components: string[];
  justification: string;
  pros?: string[];
  cons?: string[];
  addressed_follow_up?: string;
  source?: RecommendationSource;
};

/**
 * What a result set actually carries. Model output is passed through
 * unvalidated, so any field may be missing or mistyped.
 */
export type RecommendationItem = {
  [field: string]: unknown;
  source?: RecommendationSource;
};

/** Any element of a parsed model array; non-objects are kept as they came. */
export type RecommendationEntry = RecommendationItem | string | number | boolean | null | unknown[];

export function isRecommendationItem(value: unknown): value is RecommendationItem {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export type RuleErrorCode = 'Contradictory Input' | 'Potentially Unrealistic Scope';
export type ModelErrorCode = 'LLM_NOT_INITIALIZED' | 'LLM_JSON_PARSE_ERROR' | 'LLM_CHAIN_ERROR';

export type PipelineResult =
  | { kind: 'recommendations'; recommendations: RecommendationEntry[] }
  | { kind: 'rule_error'; code: RuleErrorCode; details: string }
  | { kind: 'model_error'; code: ModelErrorCode; details: string; rawText?: string }
  | { kind: 'fallback'; rawText: string; details: string };

export type RuleVerdict =
  | { kind: 'none' }
  | { kind: 'direct'; recommendations: Recommendation[] }
  | { kind: 'error'; code: RuleErrorCode; details: string };

export interface ConversationTurn {
  input: string;
  output: PipelineResult;
  timestamp: number;
}

export type ChatMessage =
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string };

export interface DisplayMessage {
  role: 'user' | 'assistant';
  content: string | PipelineResult;
}

export interface SessionDebug {
  lastPrompt?: string;
  lastRawOutput?: string;
}

export interface Session {
  id: string;
  projectDetails: ProjectDetails;
  memory: MemoryWindow;
  messages: DisplayMessage[];
  debug: SessionDebug;
  createdAt: number;
  /** Tail of the in-flight turn chain; turns in one session never overlap. */
  pending: Promise<void>;
}
