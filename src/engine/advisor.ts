import { CFG } from '../config';
import { ModelInvocationError, ModelInvoker } from '../openai/client';
import {
  isRecommendationItem,
  MODEL_SOURCE,
  PipelineResult,
  RecommendationSource,
  RULE_SOURCE,
  RuleVerdict,
  Session
} from '../types';
import { composePrompt, effectiveQuery } from './buildMessages';
import { normalizeResponse } from './normalize';
import { evaluateRules } from './rules';

function fromVerdict(verdict: Exclude<RuleVerdict, { kind: 'none' }>): PipelineResult {
  if (verdict.kind === 'error') {
    return { kind: 'rule_error', code: verdict.code, details: verdict.details };
  }
  return { kind: 'recommendations', recommendations: verdict.recommendations };
}

function withSource(result: PipelineResult, source: RecommendationSource): PipelineResult {
  if (result.kind !== 'recommendations') return result;
  return {
    kind: 'recommendations',
    recommendations: result.recommendations.map(rec => (isRecommendationItem(rec) ? { ...rec, source } : rec))
  };
}

function fromInvocationError(error: unknown): PipelineResult {
  if (error instanceof ModelInvocationError) {
    return { kind: 'model_error', code: error.code, details: error.message };
  }
  const detail = error instanceof Error ? `${error.name} - ${error.message}` : String(error);
  return { kind: 'model_error', code: 'LLM_CHAIN_ERROR', details: `An unexpected error occurred: ${detail}` };
}

/**
 * Runs one conversational turn: rule pre-checks first, the model only when no
 * rule fired. Every turn, including failed ones, is recorded in the session's
 * memory window and display log.
 */
export class Advisor {
  constructor(private readonly invoker: ModelInvoker) {}

  handleTurn(session: Session, userQuery: string): Promise<PipelineResult> {
    const turn = session.pending.then(() => this.runTurn(session, userQuery));
    session.pending = turn.then(
      () => undefined,
      () => undefined
    );
    return turn;
  }

  private async runTurn(session: Session, userQuery: string): Promise<PipelineResult> {
    const input = effectiveQuery(userQuery);
    session.messages.push({ role: 'user', content: input });

    const verdict = evaluateRules(session.projectDetails);
    let result: PipelineResult;

    if (verdict.kind !== 'none') {
      console.log(`[Advisor] Rule pre-check fired (${verdict.kind === 'error' ? verdict.code : 'direct recommendation'}); skipping model`);
      result = withSource(fromVerdict(verdict), RULE_SOURCE);
    } else {
      result = withSource(await this.askModel(session, userQuery), MODEL_SOURCE);
    }

    session.memory.append({ input, output: result, timestamp: Date.now() });
    session.messages.push({ role: 'assistant', content: result });
    console.log(`[Advisor] Session ${session.id} turn resolved as ${result.kind} (memory ${session.memory.size}/${session.memory.capacity})`);
    return result;
  }

  private async askModel(session: Session, userQuery: string): Promise<PipelineResult> {
    const prompt = composePrompt(session.projectDetails, userQuery);
    session.debug.lastPrompt = prompt;
    if (CFG.LOG_PROMPTS) {
      console.log(`[Advisor] Composed prompt:\n${prompt}`);
    }

    let raw: string;
    try {
      raw = await this.invoker.invoke(prompt, session.memory.toMessages());
    } catch (error) {
      return fromInvocationError(error);
    }
    session.debug.lastRawOutput = raw;
    return normalizeResponse(raw);
  }
}
