import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import {
  DescriptorError,
  parseDescriptor,
  readDescriptor,
  namespaceFromIdentifier,
  addMetaDescription
} from '../src/core/descriptor.js';
import { entry, fromRecord } from '../src/core/resources.js';
import fs from 'fs/promises';
import path from 'path';
import os from 'os';

describe('Descriptor - Project Metadata', () => {
  describe('parseDescriptor', () => {
    test('reads name and description', () => {
      const content = JSON.stringify({ name: '@example/status-panel', description: ' Shows service status ' });

      expect(parseDescriptor(content, 'package.json')).toEqual({
        identifier: '@example/status-panel',
        description: 'Shows service status'
      });
    });

    test('ignores fields of the wrong type', () => {
      expect(parseDescriptor('{"name": 42, "description": ""}', 'package.json')).toEqual({});
    });

    test('rejects malformed content', () => {
      expect(() => parseDescriptor('{ name', 'package.json')).toThrow(DescriptorError);
      expect(() => parseDescriptor('[]', 'package.json')).toThrow('Descriptor must be a JSON object');
    });
  });

  describe('readDescriptor', () => {
    let tempDir: string;

    beforeEach(async () => {
      tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'localize-descriptor-test-'));
    });

    afterEach(async () => {
      await fs.rm(tempDir, { recursive: true, force: true });
    });

    test('returns an empty descriptor for a missing file', async () => {
      expect(await readDescriptor(path.join(tempDir, 'package.json'))).toEqual({});
    });

    test('warns about a malformed file', async () => {
      const file = path.join(tempDir, 'package.json');
      await fs.writeFile(file, '[]');
      const warnings: string[] = [];

      const descriptor = await readDescriptor(file, { warn: message => warnings.push(message) });

      expect(descriptor).toEqual({});
      expect(warnings).toEqual([`Failed to read ${file}: Descriptor must be a JSON object`]);
    });
  });

  describe('namespaceFromIdentifier', () => {
    test('strips the scope', () => {
      expect(namespaceFromIdentifier('@example/status-panel')).toBe('status-panel');
    });

    test('normalizes other characters', () => {
      expect(namespaceFromIdentifier('My Extension!')).toBe('my-extension');
      expect(namespaceFromIdentifier('data-sources')).toBe('data-sources');
    });
  });

  describe('addMetaDescription', () => {
    test('adds the description under the meta key', () => {
      const resources = addMetaDescription(new Map(), 'ext', { description: 'Shows service status' });

      expect(resources.get('ext-meta-description')).toEqual(entry('Shows service status'));
    });

    test('does not replace an existing entry', () => {
      const resources = addMetaDescription(
        fromRecord({ 'ext-meta-description': 'Kept' }),
        'ext',
        { description: 'Ignored' }
      );

      expect(resources.get('ext-meta-description')).toEqual(entry('Kept'));
    });

    test('does nothing without a description', () => {
      expect(addMetaDescription(new Map(), 'ext', {}).size).toBe(0);
    });
  });
});
