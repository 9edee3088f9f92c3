import { input } from '@inquirer/prompts';
import chalk from 'chalk';
import type { Span, Tone } from './types.js';

export interface Terminal {
  prompt(message: string): Promise<string>;
  print(...spans: Span[]): void;
}

const TONES: Record<Tone, (text: string) => string> = {
  plain: (text) => text,
  match: chalk.cyan,
  mismatch: chalk.red,
  title: chalk.cyan,
  manual: chalk.cyan,
  warning: chalk.yellow,
  error: chalk.red,
  success: chalk.green,
  muted: chalk.gray,
};

export function renderSpans(spans: readonly Span[]): string {
  return spans.map((s) => TONES[s.tone](s.text)).join('');
}

export function createConsoleTerminal(): Terminal {
  return {
    prompt: (message) => input({ message }),
    print: (...spans) => {
      console.log(renderSpans(spans));
    },
  };
}
