/**
 * Minimal interactive prompts on top of node:readline
 */

import readline from 'node:readline';
import { Writable } from 'node:stream';

export interface AskOptions {
  /** Hide typed characters (tokens) */
  secret?: boolean;
  defaultValue?: string;
}

export function isInteractive(): boolean {
  return Boolean(process.stdin.isTTY && process.stdout.isTTY);
}

/**
 * Ask a question on stdin and resolve with the trimmed answer
 */
export function ask(question: string, options: AskOptions = {}): Promise<string> {
  let muted = false;
  const output = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      if (!muted) {
        process.stdout.write(chunk);
      }
      callback();
    },
  });

  const rl = readline.createInterface({
    input: process.stdin,
    output,
    terminal: true,
  });

  const suffix = options.defaultValue ? ` [${options.defaultValue}]` : '';

  return new Promise(resolve => {
    rl.question(`${question}${suffix}: `, answer => {
      rl.close();
      if (options.secret) {
        process.stdout.write('\n');
      }
      const trimmed = answer.trim();
      resolve(trimmed || options.defaultValue || '');
    });
    // Mute after the question itself has been written
    muted = Boolean(options.secret);
  });
}

/**
 * Yes/no question
 */
export async function confirm(question: string, defaultValue = false): Promise<boolean> {
  const answer = await ask(`${question} (${defaultValue ? 'Y/n' : 'y/N'})`);
  if (!answer) {
    return defaultValue;
  }
  return ['y', 'yes'].includes(answer.toLowerCase());
}
