import * as fs from 'fs';
import * as path from 'path';
import { createHash } from 'crypto';
import { PolicyConfigError } from '../errors';
import { PolicyDefinition, PolicyWindow } from './types';

/**
 * Normalize an extension to its lookup key: lower case with a leading dot.
 * An empty string stands for "no extension".
 */
export function normalizeExtension(extension: string): string {
  const trimmed = extension.trim().toLowerCase();
  if (trimmed === '' || trimmed === '.') {
    return '';
  }
  return trimmed.startsWith('.') ? trimmed : `.${trimmed}`;
}

function validateWindow(key: string, value: unknown): PolicyWindow {
  if (typeof value !== 'object' || value === null) {
    throw new PolicyConfigError(`Policy entry ${key} must be an object with skip and read`);
  }

  const skip: unknown = Reflect.get(value, 'skip');
  const read: unknown = Reflect.get(value, 'read');

  if (typeof skip !== 'number' || !Number.isInteger(skip) || skip < 0) {
    throw new PolicyConfigError(`Policy entry ${key}: skip must be a non-negative integer`);
  }
  if (typeof read !== 'number' || !Number.isInteger(read) || read <= 0) {
    throw new PolicyConfigError(`Policy entry ${key}: read must be a positive integer`);
  }

  return Object.freeze({ skip, read });
}

/**
 * Extension to fingerprint-window lookup table with a default entry.
 *
 * Fingerprints are only comparable under the same table. Editing the numbers
 * makes every fingerprint already stored in an index stale; that index has to
 * be rebuilt (see `rebuild-index`) or discarded.
 */
export class ExtensionPolicy {
  private readonly windows: ReadonlyMap<string, PolicyWindow>;
  private readonly fallback: PolicyWindow;

  private constructor(fallback: PolicyWindow, windows: Map<string, PolicyWindow>) {
    this.fallback = fallback;
    this.windows = windows;
  }

  static fromDefinition(definition: unknown): ExtensionPolicy {
    if (typeof definition !== 'object' || definition === null) {
      throw new PolicyConfigError('Extension policy must be an object');
    }

    const rawDefault: unknown = Reflect.get(definition, 'default');
    if (rawDefault === undefined) {
      throw new PolicyConfigError('Extension policy is missing its default entry');
    }
    const fallback = validateWindow('default', rawDefault);

    const windows = new Map<string, PolicyWindow>();
    const rawExtensions: unknown = Reflect.get(definition, 'extensions');
    if (rawExtensions !== undefined) {
      if (typeof rawExtensions !== 'object' || rawExtensions === null) {
        throw new PolicyConfigError('Extension policy "extensions" must be an object');
      }
      for (const [extension, value] of Object.entries(rawExtensions)) {
        const key = normalizeExtension(extension);
        if (key === '') {
          throw new PolicyConfigError('Extension policy keys must not be empty');
        }
        windows.set(key, validateWindow(key, value));
      }
    }

    return new ExtensionPolicy(fallback, windows);
  }

  static fromFile(filePath: string): ExtensionPolicy {
    let raw: string;
    try {
      raw = fs.readFileSync(filePath, 'utf-8');
    } catch (error) {
      throw new PolicyConfigError(
        `Cannot read extension policy ${filePath}: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new PolicyConfigError(
        `Extension policy ${path.basename(filePath)} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    return ExtensionPolicy.fromDefinition(parsed);
  }

  policyFor(extension: string): PolicyWindow {
    return this.windows.get(normalizeExtension(extension)) ?? this.fallback;
  }

  get defaultWindow(): PolicyWindow {
    return this.fallback;
  }

  get extensions(): string[] {
    return Array.from(this.windows.keys()).sort();
  }

  toDefinition(): PolicyDefinition {
    const extensions: Record<string, PolicyWindow> = {};
    for (const key of this.extensions) {
      extensions[key] = this.policyFor(key);
    }
    return { default: this.fallback, extensions };
  }

  /**
   * Short digest identifying this table, logged at startup
   */
  signature(): string {
    const definition = this.toDefinition();
    const canonical = [
      `default:${definition.default.skip}:${definition.default.read}`,
      ...this.extensions.map((key) => {
        const window = this.policyFor(key);
        return `${key}:${window.skip}:${window.read}`;
      })
    ].join('|');
    return createHash('sha256').update(canonical).digest('hex').slice(0, 12);
  }
}
