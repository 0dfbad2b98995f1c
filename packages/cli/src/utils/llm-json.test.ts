/**
 * Tests for JSON extraction from model output
 */

import { describe, it, expect } from 'vitest';
import { scanJsonObjects, stripMarkdownCodeFence } from './llm-json.js';

describe('scanJsonObjects', () => {
  it('should find every top-level object with its position', () => {
    const scan = scanJsonObjects('a {"x": 1} b {"y": {"z": true}}');

    expect(scan.objects).toEqual([
      { value: { x: 1 }, start: 2, end: 10 },
      { value: { y: { z: true } }, start: 13, end: 31 }
    ]);
    expect(scan.fragments).toEqual([]);
  });

  it('should ignore braces inside strings', () => {
    const scan = scanJsonObjects('{"text": "a } and a {", "n": "\\"}"}');

    expect(scan.objects.map(match => match.value)).toEqual([{ text: 'a } and a {', n: '"}' }]);
    expect(scan.fragments).toEqual([]);
  });

  it('should not start a string outside an object', () => {
    const scan = scanJsonObjects('He said "hi" then {"a": 1}');

    expect(scan.objects.map(match => match.value)).toEqual([{ a: 1 }]);
  });

  it('should report spans that are not JSON objects as fragments', () => {
    const scan = scanJsonObjects('set {1, 2} and {tool: x}');

    expect(scan.objects).toEqual([]);
    expect(scan.fragments).toEqual(['{1, 2}', '{tool: x}']);
  });

  it('should report a trailing unclosed object as a fragment', () => {
    const scan = scanJsonObjects('ok {"tool": "post_call", "args": {');

    expect(scan.objects).toEqual([]);
    expect(scan.fragments).toEqual(['{"tool": "post_call", "args": {']);
  });

  it('should find nothing in plain text', () => {
    expect(scanJsonObjects('no json here [1, 2]')).toEqual({ objects: [], fragments: [] });
  });
});

describe('stripMarkdownCodeFence', () => {
  it('should remove a json fence', () => {
    expect(stripMarkdownCodeFence('```json\n{"a": 1}\n```')).toBe('{"a": 1}');
  });

  it('should leave unfenced text trimmed', () => {
    expect(stripMarkdownCodeFence('  hello  ')).toBe('hello');
  });
});
