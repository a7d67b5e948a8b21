import { CFG } from '../config';
import { validateRecommendations } from '../schemas/recommendation';
import { isRecommendationItem, PipelineResult, RecommendationEntry } from '../types';
import { findJsonArraySpans } from './extractJson';

export const NOT_JSON_ARRAY_DETAILS = 'LLM did not return a parseable JSON array. Displaying raw text.';
export const NOT_A_LIST_DETAILS = 'LLM output was valid JSON, but not a list. Displaying raw text.';

// JSON.parse only ever yields these shapes
function isJsonValue(value: unknown): value is RecommendationEntry {
  return value === null || Array.isArray(value) || isRecommendationItem(value) ||
    typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

function isRecommendationList(value: unknown): value is RecommendationEntry[] {
  return Array.isArray(value) && value.every(isJsonValue);
}

function extract(raw: string, maxItems: number): PipelineResult {
  const trimmed = raw.trim();
  const spans = findJsonArraySpans(trimmed);

  if (spans.length === 0) {
    return { kind: 'fallback', rawText: trimmed, details: NOT_JSON_ARRAY_DETAILS };
  }

  let parseError: Error | null = null;
  for (const span of spans) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(span.text);
    } catch (error) {
      if (!(error instanceof SyntaxError)) throw error;
      parseError ??= error;
      continue;
    }
    if (isRecommendationList(parsed)) {
      // soft check: model output is passed through even when malformed
      const check = validateRecommendations(parsed);
      if (!check.success) {
        console.warn(`[Normalizer] Recommendations do not match the expected shape: ${check.error.issues.length} issue(s)`);
      }
      return { kind: 'recommendations', recommendations: parsed.slice(0, maxItems) };
    }
  }

  if (parseError) {
    return {
      kind: 'model_error',
      code: 'LLM_JSON_PARSE_ERROR',
      details: `Failed to parse LLM output as JSON. Error: ${parseError.message}. Raw output was: \n${raw}`,
      rawText: raw
    };
  }
  return { kind: 'fallback', rawText: trimmed, details: NOT_A_LIST_DETAILS };
}

/** Turns raw model text into exactly one pipeline result; never throws. */
export function normalizeResponse(raw: string, maxItems: number = CFG.MAX_RECOMMENDATIONS): PipelineResult {
  try {
    return extract(raw, maxItems);
  } catch (error) {
    const detail = error instanceof Error ? `${error.name} - ${error.message}` : String(error);
    return {
      kind: 'model_error',
      code: 'LLM_CHAIN_ERROR',
      details: `An unexpected error occurred: ${detail}`,
      rawText: raw
    };
  }
}
