import type { ProjectDetails } from '../schemas/project';

export type Command =
  | { type: 'turn'; query: string }
  | { type: 'details' }
  | { type: 'set'; field: keyof ProjectDetails; value: unknown }
  | { type: 'clear' }
  | { type: 'debug' }
  | { type: 'history' }
  | { type: 'help' }
  | { type: 'quit' }
  | { type: 'invalid'; message: string };

const FIELDS: (keyof ProjectDetails)[] = [
  'project_description',
  'app_type',
  'team_skills',
  'budget',
  'timeline',
  'scalability_needs'
];

function isField(name: string): name is keyof ProjectDetails {
  return FIELDS.some(f => f === name);
}

export const HELP_TEXT = [
  'Type a question, or "recommend" for initial advice. Commands:',
  '  /details                 show the current project details',
  `  /set <field> <value>     fields: ${FIELDS.join(', ')}`,
  '                           team_skills takes a comma list; scalability_needs accepts "unset"',
  '  /clear                   clear conversation history',
  '  /history                 show the conversation so far',
  '  /debug                   show the last prompt and raw model output',
  '  /help                    show this help',
  '  /quit                    exit'
].join('\n');

function setValue(field: keyof ProjectDetails, raw: string): unknown {
  if (field === 'team_skills') {
    return raw.split(',').map(s => s.trim()).filter(Boolean);
  }
  if (field === 'scalability_needs' && raw.toLowerCase() === 'unset') {
    return undefined;
  }
  return raw;
}

export function parseCommand(line: string): Command {
  const trimmed = line.trim();
  if (!trimmed.startsWith('/')) return { type: 'turn', query: trimmed };

  const [name, ...rest] = trimmed.slice(1).split(/\s+/);
  switch (name.toLowerCase()) {
    case 'details': return { type: 'details' };
    case 'clear': return { type: 'clear' };
    case 'debug': return { type: 'debug' };
    case 'history': return { type: 'history' };
    case 'help': return { type: 'help' };
    case 'quit':
    case 'exit': return { type: 'quit' };
    case 'set': {
      const [field, ...valueParts] = rest;
      if (!field || !isField(field)) {
        return { type: 'invalid', message: `Unknown field "${field ?? ''}". Fields: ${FIELDS.join(', ')}` };
      }
      return { type: 'set', field, value: setValue(field, valueParts.join(' ')) };
    }
    default:
      return { type: 'invalid', message: `Unknown command "/${name}". Type /help for commands.` };
  }
}
