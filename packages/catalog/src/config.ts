/**
 * Default configuration and config loading for cudarch
 */

import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { resolve, join } from 'path';
import { parse as parseYaml } from 'yaml';
import { CatalogError, ErrorCodes, errorMessage } from './errors.js';
import type { CatalogConfig } from './types.js';

export const DEFAULT_CONFIG: CatalogConfig = {
  version: '1.0',
  package: 'torch',
  versionPrefix: '2.',

  // Only 2.7.0 and newer publish manylinux_2_28 wheels
  platformTag: 'manylinux_2_28_x86_64',

  libraries: ['torch/lib/libtorch_cuda.so'],

  index: {
    url: 'https://pypi.org/pypi',
    timeout: 30000,
  },

  inspector: {
    command: 'cuobjdump',
    maxBuffer: 256 * 1024 * 1024,
  },

  output: {
    results: '.cudarch/results.json',
    pipTable: 'table_pip.md',
    localTable: 'table.md',
  },

  // ~850 MB, the size of a torch 2.8.0 CUDA wheel
  estimatedWheelBytes: 850 * 1024 * 1024,
};

export const CONFIG_FILE_NAMES = [
  'cudarch.config.yaml',
  'cudarch.config.yml',
  'cudarch.config.json',
  '.cudarchrc',
  '.cudarchrc.yaml',
  '.cudarchrc.json',
];

/** Environment variable overriding `inspector.command` */
export const INSPECTOR_ENV = 'CUDARCH_INSPECTOR';

export async function loadConfig(
  targetPath: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<CatalogConfig> {
  let config = DEFAULT_CONFIG;

  for (const fileName of CONFIG_FILE_NAMES) {
    const configPath = join(targetPath, fileName);
    if (!existsSync(configPath)) continue;

    const content = await readFile(configPath, 'utf-8');
    let parsed: unknown;
    try {
      parsed = fileName.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
    } catch (error) {
      throw new CatalogError(ErrorCodes.CONFIG_INVALID, `Could not parse ${configPath}: ${errorMessage(error)}`, {
        details: { path: configPath },
      });
    }
    config = mergeConfig(DEFAULT_CONFIG, parsed ?? {}, configPath);
    break;
  }

  const inspectorOverride = env[INSPECTOR_ENV]?.trim();
  if (inspectorOverride) {
    config = { ...config, inspector: { ...config.inspector, command: inspectorOverride } };
  }

  return config;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function schemaError(source: string, field: string, expected: string): CatalogError {
  return new CatalogError(
    ErrorCodes.CONFIG_SCHEMA_ERROR,
    `Invalid '${field}' in ${source}: expected ${expected}`,
    { details: { path: source, field } }
  );
}

function readString(record: Record<string, unknown>, key: string, fallback: string, source: string, prefix = ''): string {
  const value = record[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'string' || value.trim() === '') {
    throw schemaError(source, prefix + key, 'a non-empty string');
  }
  return value;
}

function readNumber(record: Record<string, unknown>, key: string, fallback: number, source: string, prefix = ''): number {
  const value = record[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    throw schemaError(source, prefix + key, 'a positive number');
  }
  return value;
}

function readSection(record: Record<string, unknown>, key: string, source: string): Record<string, unknown> {
  const value = record[key];
  if (value === undefined) return {};
  if (!isRecord(value)) {
    throw schemaError(source, key, 'an object');
  }
  return value;
}

/**
 * Merge a parsed config file over the base config. Arrays replace,
 * sections merge key by key.
 */
export function mergeConfig(base: CatalogConfig, override: unknown, source = 'config'): CatalogConfig {
  if (!isRecord(override)) {
    throw schemaError(source, '<root>', 'a mapping of options');
  }

  const libraries = override['libraries'];
  if (
    libraries !== undefined &&
    (!Array.isArray(libraries) || libraries.length === 0 || !libraries.every((p) => typeof p === 'string'))
  ) {
    throw schemaError(source, 'libraries', 'a non-empty array of glob patterns');
  }

  const index = readSection(override, 'index', source);
  const inspector = readSection(override, 'inspector', source);
  const output = readSection(override, 'output', source);

  const version = override['version'];
  if (version !== undefined && typeof version !== 'string' && typeof version !== 'number') {
    throw schemaError(source, 'version', 'a string');
  }

  return {
    version: version === undefined ? base.version : String(version),
    package: readString(override, 'package', base.package, source),
    versionPrefix: readString(override, 'versionPrefix', base.versionPrefix, source),
    platformTag: readString(override, 'platformTag', base.platformTag, source),
    libraries: Array.isArray(libraries) ? libraries.map(String) : base.libraries,
    index: {
      url: readString(index, 'url', base.index.url, source, 'index.'),
      timeout: readNumber(index, 'timeout', base.index.timeout, source, 'index.'),
    },
    inspector: {
      command: readString(inspector, 'command', base.inspector.command, source, 'inspector.'),
      maxBuffer: readNumber(inspector, 'maxBuffer', base.inspector.maxBuffer, source, 'inspector.'),
    },
    output: {
      results: readString(output, 'results', base.output.results, source, 'output.'),
      pipTable: readString(output, 'pipTable', base.output.pipTable, source, 'output.'),
      localTable: readString(output, 'localTable', base.output.localTable, source, 'output.'),
    },
    estimatedWheelBytes: readNumber(override, 'estimatedWheelBytes', base.estimatedWheelBytes, source),
  };
}

export function resolveTargetPath(input?: string): string {
  if (!input) {
    return process.cwd();
  }
  return resolve(input);
}
