import { describe, test, expect } from 'vitest';
import { generateKey, sanitizeKey } from '../src/core/keys.js';

describe('Keys - Generation', () => {
  test('sanitizes text into the key suffix', () => {
    expect(sanitizeKey('Hello, World!')).toBe('hello_world');
    expect(sanitizeKey('  Multiple   spaces -- here ')).toBe('multiple_spaces_here');
  });

  test('falls back to "text" when nothing is left', () => {
    expect(sanitizeKey('!!!')).toBe('text');
    expect(generateKey('ext', '???', new Set())).toBe('ext-text');
  });

  test('prefixes the namespace', () => {
    expect(generateKey('ext', 'Hello, World!', new Set())).toBe('ext-hello_world');
  });

  test('appends a counter on collision', () => {
    const used = new Set<string>(['ext-hello_world']);
    expect(generateKey('ext', 'Hello, World!', used)).toBe('ext-hello_world_1');
    expect(generateKey('ext', 'hello world', used)).toBe('ext-hello_world_2');
  });

  test('records generated keys', () => {
    const used = new Set<string>();
    const key = generateKey('ext', 'Save changes', used);
    expect(used.has(key)).toBe(true);
  });

  test('is stable for the same input and a fresh key set', () => {
    expect(generateKey('ext', 'Save changes', new Set())).toBe(generateKey('ext', 'Save changes', new Set()));
  });
});
