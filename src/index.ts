export { Advisor } from './engine/advisor';
export { evaluateRules, JAMSTACK_RECOMMENDATION } from './engine/rules';
export { composePrompt, summarizeProject, buildMessages } from './engine/buildMessages';
export { normalizeResponse } from './engine/normalize';
export { findJsonArraySpans } from './engine/extractJson';
export { MemoryWindow } from './state/memory';
export { SessionManager, createSession } from './state/sessionManager';
export { OpenAIInvoker, ModelInvocationError } from './openai/client';
export type { ModelInvoker, ChatClient, TokenUsage } from './openai/client';
export { renderResult, renderProjectDetails } from './ui/render';
export * from './schemas/project';
export * from './types';
