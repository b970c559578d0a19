import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { ProjectConfig, CONFIG_FILE_NAME } from '../types';
import { InvalidConfigurationError, errorMessage } from '../shared/errors';

// ── Schema ──────────────────────────────────────────────────────────

const configSchema = z.object({
  version: z.string().default('1.0'),
  project: z.object({
    name: z.string().default(''),
    namespace: z.string().default(''),
  }).default({}),
  paths: z.object({
    // resolved against the config file's directory when omitted or relative
    rootPath: z.string().min(1).optional(),
    domainPath: z.string().min(1).default('src/Core/Domain'),
    applicationPath: z.string().min(1).default('src/Core/Application'),
    persistencePath: z.string().min(1).default('src/Infra/Persistence'),
    controllersPath: z.string().min(1).default('src/Apps/Api/Controllers'),
    applicationTestsPath: z.string().min(1).default('tests/Application/ApplicationTests'),
  }).default({}),
  codeGeneration: z.object({
    defaultEntityType: z.string().default('Audited'),
    generateEvents: z.boolean().default(true),
    generateMappingProfiles: z.boolean().default(true),
    generatePermissions: z.boolean().default(true),
    generateTests: z.boolean().default(true),
  }).default({}),
  templates: z.object({
    defaultTemplate: z.string().default('default'),
  }).default({}),
});

export type RawProjectConfig = z.input<typeof configSchema>;

export interface LoadedConfig {
  config: ProjectConfig;
  /** Undefined when no configuration file was found. */
  configPath?: string;
}

// ── Loading ─────────────────────────────────────────────────────────

/**
 * Loads `layergen.json` from `explicitPath`, or the nearest one found walking
 * up from `startDir`. A missing file yields the defaults rooted at `startDir`.
 */
export function loadProjectConfig(startDir: string, explicitPath?: string): LoadedConfig {
  const configPath = explicitPath ? path.resolve(startDir, explicitPath) : findConfigFile(startDir);

  if (!configPath) {
    return { config: parseProjectConfig({}, startDir, CONFIG_FILE_NAME) };
  }
  if (!fs.existsSync(configPath)) {
    throw new InvalidConfigurationError(configPath, ['file not found']);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error: unknown) {
    throw new InvalidConfigurationError(configPath, [`unreadable JSON: ${errorMessage(error)}`]);
  }

  return { config: parseProjectConfig(raw, path.dirname(configPath), configPath), configPath };
}

/** Validates raw JSON against the schema and fills defaults. */
export function parseProjectConfig(raw: unknown, baseDir: string, source: string): ProjectConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(issue =>
      `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`);
    throw new InvalidConfigurationError(source, issues);
  }

  const parsed = result.data;
  return {
    ...parsed,
    paths: {
      ...parsed.paths,
      rootPath: path.resolve(baseDir, parsed.paths.rootPath ?? '.'),
    },
  };
}

export function findConfigFile(startDir: string): string | undefined {
  let dir = path.resolve(startDir);
  for (;;) {
    const candidate = path.join(dir, CONFIG_FILE_NAME);
    if (fs.existsSync(candidate)) return candidate;
    const parent = path.dirname(dir);
    if (parent === dir) return undefined;
    dir = parent;
  }
}

// ── Sample ──────────────────────────────────────────────────────────

/** The configuration `config init` writes, with every default spelled out. */
export function sampleConfig(): RawProjectConfig {
  return {
    version: '1.0',
    project: { name: 'MyProject', namespace: 'MyProject' },
    paths: {
      domainPath: 'src/Core/Domain',
      applicationPath: 'src/Core/Application',
      persistencePath: 'src/Infra/Persistence',
      controllersPath: 'src/Apps/Api/Controllers',
      applicationTestsPath: 'tests/Application/ApplicationTests',
    },
    codeGeneration: {
      defaultEntityType: 'Audited',
      generateEvents: true,
      generateMappingProfiles: true,
      generatePermissions: true,
      generateTests: true,
    },
    templates: { defaultTemplate: 'default' },
  };
}

export function sampleConfigJson(): string {
  return JSON.stringify(sampleConfig(), null, 2) + '\n';
}
