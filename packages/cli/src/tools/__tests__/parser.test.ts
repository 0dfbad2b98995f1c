/**
 * Invocation Parser Tests
 */

import { describe, it, expect } from 'vitest';
import { InvocationParser } from '../parser.js';
import { createToolRegistry } from '../catalogue.js';
import { EntityReference } from '../invocation.js';
import {
  AmbiguousOutputError,
  ArgumentTypeError,
  MalformedInvocationError,
  MissingArgumentError,
  UnknownToolError
} from '../../types/errors.js';
import { commentsAdapter, postAdapter } from '../../__tests__/fakes.js';

function createParser(): InvocationParser {
  return new InvocationParser(createToolRegistry({ post: postAdapter(), comments: commentsAdapter() }));
}

describe('InvocationParser', () => {
  describe('parse', () => {
    it('should parse a bare tool call', () => {
      const invocation = createParser().parse('{"tool": "post_call", "args": {"post_id": 2}}');

      expect(invocation.toolName).toBe('post_call');
      expect(invocation.args).toEqual({ post_id: 2 });
    });

    it('should find the tool call inside prose', () => {
      const invocation = createParser().parse('Sure! {"tool": "comments_call", "args": {"post_id": 5}} Fetching now.');

      expect(invocation.toolName).toBe('comments_call');
      expect(invocation.args).toEqual({ post_id: 5 });
    });

    it('should accept a call inside a code fence', () => {
      const invocation = createParser().parse('```json\n{"tool": "post_call", "args": {"post_id": 3}}\n```');

      expect(invocation.args).toEqual({ post_id: 3 });
    });

    it('should reject two tool calls', () => {
      const raw = '{"tool": "post_call", "args": {"post_id": 1}} {"tool": "post_call", "args": {"post_id": 2}}';

      expect(() => createParser().parse(raw)).toThrow(AmbiguousOutputError);
      expect(() => createParser().parse(raw)).toThrow('Model output contains 2 JSON objects; expected exactly one');
    });

    it('should reject a call next to a truncated one', () => {
      const raw = '{"tool": "post_call", "args": {"post_id": 1}} {"tool": "comments_call", "args": {"post_id"';

      expect(() => createParser().parse(raw)).toThrow(AmbiguousOutputError);
    });

    it('should reject output without a JSON object', () => {
      expect(() => createParser().parse('post 2 please')).toThrow(
        new MalformedInvocationError('Model output does not contain a JSON object')
      );
    });

    it('should require both tool and args', () => {
      expect(() => createParser().parse('{"tool": "post_call"}')).toThrow(
        'Tool call must have "tool" and "args" keys, got: tool'
      );
    });

    it('should reject extra top-level keys', () => {
      expect(() =>
        createParser().parse('{"tool": "post_call", "args": {"post_id": 1}, "reason": "asked"}')
      ).toThrow('Tool call must have exactly "tool" and "args" keys, got: tool, args, reason');
    });

    it('should reject a non-string tool name', () => {
      expect(() => createParser().parse('{"tool": 7, "args": {}}')).toThrow('"tool" must be a non-empty string');
    });

    it('should reject args that are not an object', () => {
      expect(() => createParser().parse('{"tool": "post_call", "args": [2]}')).toThrow('"args" must be an object');
    });

    it('should reject unknown tools', () => {
      expect(() => createParser().parse('{"tool": "delete_everything", "args": {}}')).toThrow(UnknownToolError);
    });

    it('should reject a missing required argument', () => {
      expect(() => createParser().parse('{"tool": "post_call", "args": {}}')).toThrow(
        new MissingArgumentError('post_call', 'post_id')
      );
    });

    it('should reject a fractional id', () => {
      expect(() => createParser().parse('{"tool": "post_call", "args": {"post_id": 1.5}}')).toThrow(
        'Argument "post_id" of tool "post_call" must be an integer, got number 1.5'
      );
    });

    it('should reject text that is not a reference', () => {
      expect(() => createParser().parse('{"tool": "post_call", "args": {"post_id": "banana"}}')).toThrow(
        new ArgumentTypeError('post_call', 'post_id', 'an integer or a reference to a post', '"banana"')
      );
    });

    it('should keep a reference for later resolution', () => {
      const invocation = createParser().parse('{"tool": "comments_call", "args": {"post_id": "that post"}}');
      const value = invocation.args.post_id;

      expect(value).toBeInstanceOf(EntityReference);
      expect(value).toEqual(new EntityReference('post', 'that post'));
      expect(invocation.hasReferences()).toBe(true);
    });

    it('should drop arguments the schema does not know', () => {
      const invocation = createParser().parse('{"tool": "post_call", "args": {"post_id": 2, "verbose": true}}');

      expect(invocation.args).toEqual({ post_id: 2 });
    });
  });

  describe('classify', () => {
    it('should pass prose through as a direct answer', () => {
      expect(createParser().classify('  Post 2 is about cats.  ')).toEqual({ kind: 'text', text: 'Post 2 is about cats.' });
    });

    it('should treat braces without tool keys as prose', () => {
      expect(createParser().classify('Use {curly} braces')).toEqual({ kind: 'text', text: 'Use {curly} braces' });
    });

    it('should treat quoted JSON without tool keys as prose', () => {
      const answer = 'A post looks like {"id": 1, "title": "x"}.';

      expect(createParser().classify(answer)).toEqual({ kind: 'text', text: answer });
    });

    it('should treat an object with only an args key as a tool call', () => {
      expect(() => createParser().classify('{"args": {"post_id": 1}}')).toThrow(
        'Tool call must have "tool" and "args" keys, got: args'
      );
    });

    it('should unwrap a fenced prose answer', () => {
      expect(createParser().classify('```\nplain answer\n```')).toEqual({ kind: 'text', text: 'plain answer' });
    });

    it('should reject an empty response', () => {
      expect(() => createParser().classify('   ')).toThrow('Model returned an empty response');
    });

    it('should treat a truncated tool call as a malformed one', () => {
      expect(() => createParser().classify('{"tool": "post_call", "args": {"post_id": 2}')).toThrow(
        'Model output does not contain a JSON object'
      );
    });

    it('should return a validated invocation for a tool call', () => {
      const output = createParser().classify('{"tool": "post_call", "args": {"post_id": 1}}');

      expect(output.kind).toBe('tool');
      if (output.kind === 'tool') {
        expect(output.invocation.toJSON()).toEqual({ tool: 'post_call', args: { post_id: 1 } });
      }
    });
  });
});
