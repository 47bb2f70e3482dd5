/**
 * Password entry for connect attempts.
 * QUARRY_PASSWORD wins; otherwise the user is asked on the terminal with
 * echo off. Without a terminal there is nobody to ask.
 */

import { createInterface } from 'node:readline';
import { Writable } from 'node:stream';
import type { CredentialPrompt, PromptRequest } from '@quarry/core';

const REASONS: Record<PromptRequest['reason'], string> = {
  policy: '',
  missing: ' (no saved password)',
  store_unavailable: ' (secret store unavailable)',
};

export function promptLabel(request: PromptRequest): string {
  const { profile } = request;
  const target = profile.user ? `${profile.user}@${profile.name}` : profile.name;
  return `Password for ${target}${REASONS[request.reason]}: `;
}

/** Resolves null when Ctrl-C or Ctrl-D ends the prompt */
export function readHidden(label: string): Promise<string | null> {
  let muted = false;
  const sink = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      if (!muted) process.stderr.write(chunk);
      callback();
    },
  });

  const rl = createInterface({ input: process.stdin, output: sink, terminal: true });
  return new Promise((resolve) => {
    let answered = false;
    rl.on('SIGINT', () => rl.close());
    rl.on('close', () => {
      if (!answered) {
        process.stderr.write('\n');
        resolve(null);
      }
    });
    rl.question(label, (answer) => {
      answered = true;
      muted = false;
      process.stderr.write('\n');
      rl.close();
      resolve(answer);
    });
    muted = true;
  });
}

export interface PasswordPromptOptions {
  env?: NodeJS.ProcessEnv;
  interactive?: boolean;
  read?: (label: string) => Promise<string | null>;
}

export function passwordPrompt(options: PasswordPromptOptions = {}): CredentialPrompt {
  const env = options.env ?? process.env;
  const interactive = options.interactive ?? Boolean(process.stdin.isTTY);
  const read = options.read ?? readHidden;
  return {
    async ask(request) {
      const fromEnv = env.QUARRY_PASSWORD;
      if (fromEnv) return fromEnv;
      if (!interactive) return null;
      return read(promptLabel(request));
    },
  };
}
