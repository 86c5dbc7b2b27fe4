import * as readline from 'readline';
import type { ChatSessionService } from '../modules/chat/chat-session.service';
import { DEFAULT_MODE, type ChatMode } from '../modules/chat/modes/mode.config';
import { CLI_HELP, parseCliCommand } from './cli-commands';

// ANSI colors
const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  green: '\x1b[32m',
  cyan: '\x1b[36m',
  yellow: '\x1b[33m',
};

/**
 * Terminal chat loop over a single session.
 */
export class Repl {
  private mode: ChatMode = DEFAULT_MODE;
  private readonly sessionId: string;

  constructor(
    private readonly sessions: ChatSessionService,
    private readonly rl: readline.Interface,
    private readonly output: NodeJS.WritableStream = process.stdout,
  ) {
    this.sessionId = this.sessions.createSession().id;
  }

  private println(text: string = ''): void {
    this.output.write(`${text}\n`);
  }

  private question(prompt: string): Promise<string | null> {
    return new Promise((resolve) => {
      const onClose = () => resolve(null);
      this.rl.once('close', onClose);
      this.rl.question(prompt, (answer) => {
        this.rl.off('close', onClose);
        resolve(answer);
      });
    });
  }

  async run(): Promise<void> {
    this.println(`${colors.cyan}${colors.bright}Chatbot is running!${colors.reset} Type 'exit' to quit, /help for commands.`);

    while (true) {
      const line = await this.question(`${colors.green}You [${this.mode}]:${colors.reset} `);
      if (line === null) {
        break;
      }

      const command = parseCliCommand(line);
      switch (command.type) {
        case 'skip':
          continue;
        case 'exit':
          this.println('Goodbye!');
          return;
        case 'help':
          this.println(CLI_HELP);
          continue;
        case 'mode':
          this.mode = command.mode;
          this.println(`${colors.dim}Mode: ${this.mode}${colors.reset}`);
          continue;
        case 'reset':
          this.sessions.resetHistory(this.sessionId);
          this.println(`${colors.dim}Conversation cleared.${colors.reset}`);
          continue;
        case 'history':
          for (const message of this.sessions.getHistory(this.sessionId)) {
            this.println(`${colors.dim}${message.role}:${colors.reset} ${message.content}`);
          }
          continue;
        case 'message': {
          const result = await this.sessions.sendMessage(this.sessionId, command.text, this.mode);
          const tag = result.usedFallback ? `${colors.yellow}(fallback)${colors.reset} ` : '';
          this.println(`${colors.cyan}Bot:${colors.reset} ${tag}${result.reply}`);
          continue;
        }
      }
    }
  }
}
