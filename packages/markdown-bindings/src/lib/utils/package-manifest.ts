/**
 * Enhanced component detection
 *
 * Whether the enhanced component set is available is decided once, from the
 * consuming project's package.json, and then passed into the configuration as
 * `useEnhancedComponents`. Rendering never probes the environment.
 */

import { readFile } from 'node:fs/promises';
import { InvalidConfigurationError } from '../types/errors';

export const DEFAULT_ENHANCED_PACKAGE = '@markdown-kit/enhanced-components';

const DEPENDENCY_FIELDS = ['dependencies', 'devDependencies', 'peerDependencies'] as const;
type DependencyField = (typeof DEPENDENCY_FIELDS)[number];

export type PackageManifest = {
  readonly name?: string;
} & { readonly [F in DependencyField]?: Readonly<Record<string, string>> };

export function hasDependencyNamed(manifest: PackageManifest, name: string): boolean {
  return DEPENDENCY_FIELDS.some((field) => {
    const dependencies = manifest[field];
    return dependencies !== undefined && Object.prototype.hasOwnProperty.call(dependencies, name);
  });
}

export function detectEnhancedComponents(
  manifest: PackageManifest,
  packageName: string = DEFAULT_ENHANCED_PACKAGE
): boolean {
  return hasDependencyNamed(manifest, packageName);
}

/**
 * Validate parsed package.json content. Only `name` and the dependency maps
 * are kept.
 */
export function toPackageManifest(value: unknown, source = 'package.json'): PackageManifest {
  if (!isRecord(value)) {
    throw new InvalidConfigurationError(source, 'manifest must be a JSON object');
  }

  const manifest: { name?: string } & { [F in DependencyField]?: Record<string, string> } = {};
  if (typeof value.name === 'string') {
    manifest.name = value.name;
  }

  for (const field of DEPENDENCY_FIELDS) {
    const dependencies = value[field];
    if (dependencies === undefined) continue;
    if (!isRecord(dependencies)) {
      throw new InvalidConfigurationError(`${source}#${field}`, 'expected an object of versions');
    }
    manifest[field] = Object.fromEntries(
      Object.entries(dependencies).map(([name, version]) => [name, String(version)])
    );
  }

  return manifest;
}

export async function loadPackageManifest(path: string): Promise<PackageManifest> {
  const content = await readFile(path, 'utf8');

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidConfigurationError(path, `not valid JSON (${reason})`);
  }

  return toPackageManifest(parsed, path);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
