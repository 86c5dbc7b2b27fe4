import { resolveMode } from '../modules/chat/modes/mode-resolver';
import type { ChatMode } from '../modules/chat/modes/mode.config';

export type CliCommand =
  | { type: 'exit' }
  | { type: 'skip' }
  | { type: 'reset' }
  | { type: 'history' }
  | { type: 'help' }
  | { type: 'mode'; mode: ChatMode }
  | { type: 'message'; text: string };

const EXIT_WORDS = new Set(['exit', 'quit']);

// Parses one line typed at the prompt
export function parseCliCommand(line: string): CliCommand {
  const input = line.trim();

  if (!input) {
    return { type: 'skip' };
  }
  if (EXIT_WORDS.has(input.toLowerCase())) {
    return { type: 'exit' };
  }

  if (input.startsWith('/')) {
    const [name, ...rest] = input.slice(1).split(/\s+/);
    switch (name.toLowerCase()) {
      case 'mode':
        return { type: 'mode', mode: resolveMode(rest.join(' ')) };
      case 'reset':
        return { type: 'reset' };
      case 'history':
        return { type: 'history' };
      case 'help':
        return { type: 'help' };
    }
  }

  return { type: 'message', text: input };
}

export const CLI_HELP = [
  'Commands:',
  '  /mode <chat|code|knowledge>  switch mode',
  '  /reset                       clear the conversation',
  '  /history                     show the conversation',
  '  exit | quit                  leave',
].join('\n');
