/**
 * Prompt Assembly and Response Sanitizer Tests
 */

import { describe, it, expect } from 'vitest';
import { assemblePrompt } from '../chat/prompt.js';
import { sanitizeResponse } from '../chat/sanitize.js';
import { EmptyTranscriptError } from '../chat/errors.js';
import { createTranscript, createTurn } from '../chat/transcript.js';

describe('assemblePrompt', () => {
  it('frames a single user turn as one line', () => {
    expect(assemblePrompt([createTurn('user', 'hi')])).toBe('user: hi\n');
  });

  it('prefixes earlier turns with their role', () => {
    const transcript = [createTurn('model', 'hello'), createTurn('user', 'hi')];

    expect(assemblePrompt(transcript)).toBe('model: hello\nuser: hi\n');
  });

  it('joins multi-part turns with single spaces', () => {
    const transcript = [
      createTurn('user', 'first', 'second'),
      createTurn('model', 'a', 'b', 'c'),
      createTurn('user', 'last', 'one'),
    ];

    expect(assemblePrompt(transcript)).toBe('user: first second\nmodel: a b c\nuser: last one\n');
  });

  it('labels the final line as the user even when the last turn is the model', () => {
    const transcript = [createTurn('user', 'ping'), createTurn('model', 'pong')];

    expect(assemblePrompt(transcript)).toBe('user: ping\nuser: pong\n');
  });

  it('passes markup through unescaped', () => {
    expect(assemblePrompt([createTurn('user', 'a <b> & *c*\nnext')])).toBe('user: a <b> & *c*\nnext\n');
  });

  it('starts from the welcome turn of a fresh transcript', () => {
    const transcript = [...createTranscript(), createTurn('user', 'hello')];

    expect(assemblePrompt(transcript)).toBe(
      "model: Hi! I'm Parley, your assistant. How can I help you today?\nuser: hello\n"
    );
  });

  it('rejects an empty transcript', () => {
    expect(() => assemblePrompt([])).toThrow(EmptyTranscriptError);
  });
});

describe('sanitizeResponse', () => {
  it('strips asterisks and bars and converts newlines', () => {
    expect(sanitizeResponse('a*b|c\nd')).toBe('abc<br>d');
  });

  it('handles the empty string', () => {
    expect(sanitizeResponse('')).toBe('');
  });

  it('replaces every occurrence', () => {
    expect(sanitizeResponse('**bold**\n\n| x | y |')).toBe('bold<br><br> x  y ');
  });

  it('is idempotent on already clean text', () => {
    const clean = 'plain text with <br> markers';

    expect(sanitizeResponse(sanitizeResponse(clean))).toBe(sanitizeResponse(clean));
    expect(sanitizeResponse(clean)).toBe(clean);
  });
});
