#!/usr/bin/env node
import { readFileSync } from 'fs';
import { createInterface } from 'readline';
import { CFG } from '../config';
import { Advisor } from '../engine/advisor';
import { OpenAIInvoker } from '../openai/client';
import { ProjectDetails, ProjectDetailsError, parseProjectDetails } from '../schemas/project';
import { SessionManager } from '../state/sessionManager';
import { renderMessage, renderProjectDetails, renderResult } from '../ui/render';
import { HELP_TEXT, parseCommand } from './commands';

function loadProjectDetails(argv: string[]): ProjectDetails | undefined {
  const idx = argv.indexOf('--project');
  if (idx === -1) return undefined;
  const file = argv[idx + 1];
  if (!file) throw new Error('--project requires a path to a JSON file');
  return parseProjectDetails(JSON.parse(readFileSync(file, 'utf-8')));
}

async function main() {
  const projectDetails = loadProjectDetails(process.argv.slice(2));
  const sessions = new SessionManager(CFG.MEMORY_WINDOW);
  const session = sessions.createSession(undefined, projectDetails);

  const invoker = new OpenAIInvoker();
  if (!invoker.initialized) {
    console.warn('[Advisor] Model unavailable: only rule-based answers will succeed. Set OPENAI_API_KEY to enable it.');
  }
  const advisor = new Advisor(invoker);

  console.log('Tech Stack Advisor');
  console.log(renderProjectDetails(session.projectDetails));
  console.log(HELP_TEXT);

  const rl = createInterface({ input: process.stdin, output: process.stdout, prompt: '\n> ' });
  rl.prompt();
  try {
    for await (const line of rl) {
      const command = parseCommand(line);

      switch (command.type) {
        case 'quit':
          return;
        case 'help':
          console.log(HELP_TEXT);
          break;
        case 'details':
          console.log(renderProjectDetails(session.projectDetails));
          break;
        case 'set': {
          const patch: Partial<Record<keyof ProjectDetails, unknown>> = {};
          patch[command.field] = command.value;
          try {
            sessions.updateProjectDetails(session.id, patch);
            console.log(renderProjectDetails(session.projectDetails));
          } catch (error) {
            if (!(error instanceof ProjectDetailsError)) throw error;
            console.error(error.issues.join('\n'));
          }
          break;
        }
        case 'clear':
          sessions.clearHistory(session.id);
          console.log('Conversation history cleared!');
          break;
        case 'history':
          console.log(session.messages.map(renderMessage).join('\n\n') || 'No messages yet.');
          break;
        case 'debug': {
          console.log(`Last Formatted Input to LLM:\n${session.debug.lastPrompt ?? 'N/A'}`);
          console.log(`\nLast Raw Output from LLM:\n${session.debug.lastRawOutput ?? 'N/A'}`);
          const usage = invoker.usage();
          console.log(`\nTokens - Input: ${usage.inputTokens}, Output: ${usage.outputTokens}, Requests: ${usage.requests}`);
          break;
        }
        case 'invalid':
          console.error(command.message);
          break;
        case 'turn': {
          if (!command.query) break;
          const result = await advisor.handleTurn(session, command.query);
          console.log(renderResult(result));
          break;
        }
      }
      rl.prompt();
    }
  } finally {
    rl.close();
  }
}

if (require.main === module) {
  main().catch(error => {
    console.error('[Advisor] FATAL ERROR:', error instanceof Error ? error.message : error);
    process.exit(1);
  });
}
