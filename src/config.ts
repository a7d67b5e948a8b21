import 'dotenv/config';

function positiveInt(value: string | undefined, fallback: number): number {
  const n = Number(value);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

export const CFG = {
  OPENAI_API_KEY: process.env.OPENAI_API_KEY || '',
  CHAT_MODEL: process.env.CHAT_MODEL || 'gpt-4o-mini',
  TEMPERATURE: Number(process.env.TEMPERATURE || 0.7),
  TIMEOUT_MS: positiveInt(process.env.REQUEST_TIMEOUT_MS, 30000),

  // Conversation memory: number of turns replayed to the model
  MEMORY_WINDOW: positiveInt(process.env.MEMORY_WINDOW, 5),

  MAX_RECOMMENDATIONS: 3,

  // Prints every composed prompt; noisy, diagnostics only
  LOG_PROMPTS: process.env.LOG_PROMPTS === 'true'
};

export type AdvisorConfig = typeof CFG;
