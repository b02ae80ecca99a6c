/**
 * CLI Interface
 *
 * Terminal REPL. One query at a time: lines typed while an answer is being
 * produced are ignored. Both turns of every exchange go to the chat history.
 */

import * as readline from 'readline';
import { createLogger, setReadlineInterface } from '../utils/logger.js';
import type { HybridAssistant } from '../agent/hybrid-assistant.js';
import type { AssistantResponse, UserQuery } from '../agent/router/types.js';
import type { CareStore } from '../care/store.js';
import { buildProfileSnapshot } from '../care/profile-snapshot.js';
import { PROVIDER_LABELS } from './command-handler.js';
import type { CommandHandler } from './types.js';

const logger = createLogger('cli');

const PROMPT = '\x1b[36mTu:\x1b[0m ';
const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
const EXIT_COMMANDS = new Set(['salir', 'exit']);

export const BUSY_MESSAGE = 'Un momento, todavia estoy respondiendo tu pregunta anterior.';

export type LineResult = 'empty' | 'ignored' | 'command' | 'answered' | 'exit';

export interface Spinner {
  stop: () => void;
}

export function createSpinner(message: string): Spinner {
  let i = 0;
  const interval = setInterval(() => {
    const frame = SPINNER_FRAMES[i % SPINNER_FRAMES.length];
    process.stdout.write(`\r\x1b[33m${frame}\x1b[0m ${message}`);
    i++;
  }, 80);

  return {
    stop: () => {
      clearInterval(interval);
      process.stdout.write('\r\x1b[K');
    },
  };
}

export function formatAnswer(response: AssistantResponse): string {
  const badge = response.fellBack
    ? `${PROVIDER_LABELS[response.provider]}, respaldo`
    : PROVIDER_LABELS[response.provider];
  return `\x1b[33mAsistente\x1b[0m \x1b[2m(${badge})\x1b[0m: ${response.content}`;
}

export interface CareCLIDeps {
  assistant: Pick<HybridAssistant, 'process'>;
  store: CareStore;
  profileId: string;
  commands: CommandHandler;
  timezone: string;
  output?: (text: string) => void;
  /** Show a spinner while answering */
  interactive?: boolean;
  onExit?: () => void;
}

export class CareCLI {
  private deps: CareCLIDeps;
  private output: (text: string) => void;
  private rl: readline.Interface | null = null;
  private processing = false;

  constructor(deps: CareCLIDeps) {
    this.deps = deps;
    this.output = deps.output ?? ((text) => console.log(text));
  }

  isProcessing(): boolean {
    return this.processing;
  }

  async handleLine(input: string): Promise<LineResult> {
    const trimmed = input.trim();
    if (!trimmed) {
      return 'empty';
    }

    if (this.processing) {
      this.output(BUSY_MESSAGE);
      return 'ignored';
    }

    if (trimmed.startsWith('/')) {
      return this.handleCommand(trimmed.slice(1));
    }

    this.processing = true;
    const spinner = this.deps.interactive ? createSpinner('Pensando...') : null;

    try {
      const { store, profileId, timezone } = this.deps;
      const profile = buildProfileSnapshot(store, profileId, timezone);
      const query: UserQuery = { text: trimmed, isVoiceInput: false };

      store.saveChatMessage({ profileId, role: 'user', content: query.text, isVoiceInput: query.isVoiceInput });
      const response = await this.deps.assistant.process(query.text, profile);
      store.saveChatMessage({
        profileId,
        role: 'assistant',
        content: response.content,
        provider: response.provider,
        processingTimeMs: response.processingTimeMs,
        errorMessage: response.error?.message ?? null,
      });

      spinner?.stop();
      this.output(`\n${formatAnswer(response)}\n`);
      return 'answered';
    } finally {
      spinner?.stop();
      this.processing = false;
    }
  }

  private async handleCommand(raw: string): Promise<LineResult> {
    const [name = '', ...rest] = raw.split(/\s+/);
    const command = name.toLowerCase();

    if (EXIT_COMMANDS.has(command)) {
      return 'exit';
    }

    const result = await this.deps.commands.handle(command, rest.join(' '));
    this.output(result ?? `Comando desconocido: /${name}. Escribe /ayuda.`);
    return 'command';
  }

  start(): void {
    if (this.rl) return;

    this.rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
    });
    this.rl.setPrompt(PROMPT);
    logger.info('CLI started');

    this.rl.on('line', (line) => {
      this.handleLine(line)
        .then((result) => {
          if (result === 'exit') {
            this.stop();
            return;
          }
          if (result !== 'ignored') {
            this.showPrompt();
          }
        })
        .catch((error: unknown) => {
          logger.error('cli_line_failed', { error: error instanceof Error ? error.message : 'Unknown error' });
          this.output(`\x1b[31mError:\x1b[0m ${error instanceof Error ? error.message : 'Error desconocido'}`);
          this.showPrompt();
        });
    });

    this.rl.on('close', () => {
      setReadlineInterface(null, null);
      this.rl = null;
      this.deps.onExit?.();
    });

    this.rl.prompt();
    setReadlineInterface(this.rl, PROMPT);
  }

  showPrompt(): void {
    if (this.rl && !this.processing) {
      this.rl.prompt();
    }
  }

  stop(): void {
    this.rl?.close();
  }
}
