import fs from 'fs/promises';
import type { ProjectDescriptor, Reporter, ResourceMap } from '../plugins/types.js';
import { sanitizeKey } from './keys.js';
import { entry } from './resources.js';

/**
 * Raised when a project descriptor exists but cannot be understood
 */
export class DescriptorError extends Error {
  file: string;

  constructor(message: string, file: string) {
    super(message);
    this.name = 'DescriptorError';
    this.file = file;
  }
}

/**
 * Parse a package.json-style descriptor: `name` is the identifier, `description` the description
 */
export function parseDescriptor(content: string, file: string): ProjectDescriptor {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new DescriptorError(`Malformed descriptor: ${error instanceof Error ? error.message : String(error)}`, file);
  }

  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw new DescriptorError('Descriptor must be a JSON object', file);
  }

  const descriptor: ProjectDescriptor = {};
  if ('name' in data && typeof data.name === 'string' && data.name.trim()) {
    descriptor.identifier = data.name.trim();
  }
  if ('description' in data && typeof data.description === 'string' && data.description.trim()) {
    descriptor.description = data.description.trim();
  }
  return descriptor;
}

/**
 * Read the project descriptor. A missing file yields an empty descriptor;
 * a malformed one is reported and treated as empty.
 */
export async function readDescriptor(filePath: string, reporter?: Reporter): Promise<ProjectDescriptor> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return {};
    }
    throw error;
  }

  try {
    return parseDescriptor(content, filePath);
  } catch (error) {
    if (error instanceof DescriptorError) {
      reporter?.warn?.(`Failed to read ${error.file}: ${error.message}`);
      return {};
    }
    throw error;
  }
}

/**
 * Key namespace derived from a descriptor identifier: `@scope/my-ext` → `my-ext`
 */
export function namespaceFromIdentifier(identifier: string): string {
  const name = identifier.includes('/') ? identifier.slice(identifier.lastIndexOf('/') + 1) : identifier;
  const namespace = name.toLowerCase().replace(/[^a-z0-9._-]+/g, '-').replace(/^-+|-+$/g, '');
  return namespace || sanitizeKey(name);
}

/**
 * Add the descriptor's description under `{namespace}-meta-description`, unless the key is taken
 */
export function addMetaDescription(
  resources: ResourceMap,
  namespace: string,
  descriptor: ProjectDescriptor
): ResourceMap {
  const key = `${namespace}-meta-description`;
  if (descriptor.description && !resources.has(key)) {
    resources.set(key, entry(descriptor.description));
  }
  return resources;
}
