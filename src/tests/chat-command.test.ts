/**
 * Terminal Chat Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ChatResponder } from '../chat/responder.js';
import { WELCOME_MESSAGE, turnText } from '../chat/transcript.js';
import { ChatLoop, toTerminalText } from '../cli/commands/chat.js';
import type { CompletionClient } from '../clients/anthropic/client.js';
import { ok } from '../types/index.js';

function countingClient(): CompletionClient & { prompts: string[] } {
  const prompts: string[] = [];
  return {
    model: 'claude-test',
    prompts,
    async complete(prompt: string) {
      prompts.push(prompt);
      return `reply ${prompts.length}`;
    },
  };
}

describe('ChatLoop', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('handles lines that arrive while a reply is pending in order', async () => {
    let releaseFirst = () => {};
    const first = new Promise<void>(resolve => {
      releaseFirst = () => resolve();
    });
    const prompts: string[] = [];
    const client: CompletionClient = {
      model: 'claude-test',
      async complete(prompt: string) {
        prompts.push(prompt);
        if (prompts.length === 1) await first;
        return `reply ${prompts.length}`;
      },
    };
    const loop = new ChatLoop(new ChatResponder(ok(client)), 50);

    const pending = [loop.submit('first'), loop.submit('second')];
    await new Promise(resolve => setTimeout(resolve, 0));
    expect(prompts).toHaveLength(1);

    releaseFirst();
    expect(await Promise.all(pending)).toEqual(['continue', 'continue']);

    expect(loop.transcript.map(turnText)).toEqual([
      WELCOME_MESSAGE,
      'first',
      'reply 1',
      'second',
      'reply 2',
    ]);
    expect(prompts[1]).toBe(
      `model: ${WELCOME_MESSAGE}\nuser: first\nmodel: reply 1\nuser: second\n`
    );
  });

  it('clears only after earlier messages are answered', async () => {
    const loop = new ChatLoop(new ChatResponder(ok(countingClient())), 50);

    await Promise.all([loop.submit('hello'), loop.submit('/clear')]);

    expect(loop.transcript.map(turnText)).toEqual([WELCOME_MESSAGE]);
  });

  it('skips blank lines and reports exit', async () => {
    const client = countingClient();
    const loop = new ChatLoop(new ChatResponder(ok(client)), 50);

    expect(await loop.submit('   ')).toBe('continue');
    expect(await loop.submit('QUIT')).toBe('exit');
    expect(client.prompts).toEqual([]);
  });

  it('windows the history', async () => {
    const loop = new ChatLoop(new ChatResponder(ok(countingClient())), 2);

    await loop.submit('one');
    await loop.submit('two');

    expect(loop.transcript.map(turnText)).toEqual(['two', 'reply 2']);
  });
});

describe('toTerminalText', () => {
  it('turns line-break markers into newlines', () => {
    expect(toTerminalText('one<br>two')).toBe('one\ntwo');
  });
});
