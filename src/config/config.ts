import * as fs from 'fs-extra';
import * as path from 'path';
import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from '../utils/errors';
import { logger } from '../utils/logger';

dotenv.config();

const DEFAULT_PROMPT_TEMPLATE = [
  'You are annotating a microscope image from a crystallization experiment.',
  'The image belongs to the {phase} phase: {description}',
  'Typical process stages: {processStages}. Expected visual markers: {visualMarkers}.',
  'Write one caption of 100 to 300 characters. Start with "{phase}:", describe what is visible,',
  'and include "Growth: N%" with an estimate between {growthMin} and {growthMax}, followed by "Stage: <process stage>."',
  'Reply with the caption only.',
].join(' ');

const growthBandSchema = z
  .tuple([z.number().min(0).max(100), z.number().min(0).max(100)])
  .refine(([min, max]) => min <= max, { message: 'growth band minimum must not exceed its maximum' });

const phaseSchema = z.object({
  label: z.string().min(1),
  directory: z.string().min(1),
  displayName: z.string().min(1).optional(),
  description: z.string().default(''),
  synonyms: z.array(z.string().min(1)).default([]),
  growthBand: growthBandSchema,
  processStages: z.array(z.string()).default([]),
  visualMarkers: z.array(z.string()).default([]),
  visualTerms: z.array(z.string().min(1)).default([]),
  contradictoryTerms: z.array(z.string().min(1)).default([]),
});

const providerBase = {
  id: z.string().min(1),
  model: z.string().min(1),
  baseUrl: z.string().url().optional(),
  requestsPerMinute: z.number().int().positive().optional(),
  maxImageBytes: z.number().int().positive().optional(),
};

const providerSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('openrouter'), apiKey: z.string().default(''), ...providerBase }),
  z.object({ kind: z.literal('anthropic'), apiKey: z.string().default(''), ...providerBase }),
  z.object({ kind: z.literal('ollama'), ...providerBase }),
]);

const weightsSchema = z.object({
  phaseMatch: z.number().int().min(0).default(25),
  growthPresent: z.number().int().min(0).default(10),
  growthInRange: z.number().int().min(0).default(15),
  visualDescription: z.number().int().min(0).default(15),
  processStage: z.number().int().min(0).default(10),
  technicalTerms: z.number().int().min(0).default(10),
  length: z.number().int().min(0).default(10),
  noContradiction: z.number().int().min(0).default(5),
});

const configSchema = z
  .object({
    dataset: z.object({
      root: z.string().min(1),
      extensions: z.array(z.string().min(2)).default(['.jpg', '.jpeg', '.png', '.webp']),
      phases: z.array(phaseSchema).min(1),
    }),
    providers: z.array(providerSchema).min(1),
    activeProvider: z.string().min(1),
    prompt: z
      .object({ template: z.string().min(1).default(DEFAULT_PROMPT_TEMPLATE) })
      .default({}),
    requester: z
      .object({
        concurrency: z.number().int().positive().default(4),
        maxAttempts: z.number().int().positive().default(3),
        backoffBaseMs: z.number().int().min(0).default(1000),
        backoffMaxMs: z.number().int().min(0).default(30000),
        jitterMs: z.number().int().min(0).default(250),
        requestTimeoutMs: z.number().int().positive().default(60000),
      })
      .default({}),
    scoring: z
      .object({
        weights: weightsSchema.default({}),
        thresholds: z
          .object({
            excellent: z.number().int().default(90),
            good: z.number().int().default(80),
            acceptable: z.number().int().default(70),
          })
          .default({}),
        length: z
          .object({
            min: z.number().int().min(0).default(100),
            max: z.number().int().positive().default(300),
          })
          .default({}),
        processStageTerms: z.array(z.string().min(1)).default([]),
        technicalTerms: z.array(z.string().min(1)).default([]),
      })
      .default({}),
    validation: z
      .object({ regenerationCap: z.number().int().min(0).default(2) })
      .default({}),
    export: z
      .object({
        outputDir: z.string().min(1).default('output'),
        acceptHumanOverrides: z.boolean().default(false),
        overridesFile: z.string().optional(),
      })
      .default({}),
    checkpoint: z.object({ path: z.string().optional() }).default({}),
  })
  .superRefine((cfg, ctx) => {
    const weightSum = Object.values(cfg.scoring.weights).reduce((sum, w) => sum + w, 0);
    if (weightSum !== 100) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['scoring', 'weights'], message: `weights must sum to 100 (got ${weightSum})` });
    }
    const { excellent, good, acceptable } = cfg.scoring.thresholds;
    if (!(excellent > good && good > acceptable)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['scoring', 'thresholds'], message: 'thresholds must satisfy excellent > good > acceptable' });
    }
    if (cfg.scoring.length.min > cfg.scoring.length.max) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['scoring', 'length'], message: 'length.min must not exceed length.max' });
    }
    const labels = new Set<string>();
    const directories = new Set<string>();
    cfg.dataset.phases.forEach((phase, index) => {
      if (labels.has(phase.label)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['dataset', 'phases', index, 'label'], message: `duplicate phase label "${phase.label}"` });
      }
      if (directories.has(phase.directory)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['dataset', 'phases', index, 'directory'], message: `duplicate phase directory "${phase.directory}"` });
      }
      labels.add(phase.label);
      directories.add(phase.directory);
    });
    const providerIds = cfg.providers.map(p => p.id);
    if (new Set(providerIds).size !== providerIds.length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['providers'], message: 'provider ids must be unique' });
    }
    if (!providerIds.includes(cfg.activeProvider)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['activeProvider'], message: `unknown provider "${cfg.activeProvider}"` });
    }
  });

export type AnnotatorConfig = z.infer<typeof configSchema>;
export type PhaseDefinition = AnnotatorConfig['dataset']['phases'][number];
export type ProviderConfig = AnnotatorConfig['providers'][number];
export type RequesterSettings = AnnotatorConfig['requester'];
export type ScoringSettings = AnnotatorConfig['scoring'];
export type ScoringWeights = ScoringSettings['weights'];

// Environment variables that may be absent; they resolve to an empty string
const OPTIONAL_ENV_VARS = new Set([
  'OPENROUTER_API_KEY',
  'ANTHROPIC_API_KEY',
]);

function resolveEnvValue(value: string): string {
  if (!value.startsWith('env:')) {
    return value;
  }
  const envKey = value.substring(4);
  const envValue = process.env[envKey];
  if (envValue === undefined || envValue === '') {
    if (!OPTIONAL_ENV_VARS.has(envKey)) {
      throw new ConfigError(`Environment variable ${envKey} is not set`);
    }
    return '';
  }
  return envValue;
}

function resolveEnvObject(value: unknown): unknown {
  if (typeof value === 'string') {
    return resolveEnvValue(value);
  }
  if (Array.isArray(value)) {
    return value.map(item => resolveEnvObject(item));
  }
  if (value !== null && typeof value === 'object') {
    const resolved: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      resolved[key] = resolveEnvObject(entry);
    }
    return resolved;
  }
  return value;
}

/**
 * Validates raw configuration data, resolving `env:` references and filling defaults.
 * Relative dataset and output paths are resolved against `baseDir`.
 */
export function parseConfig(data: unknown, baseDir: string = process.cwd()): AnnotatorConfig {
  const parsed = configSchema.safeParse(resolveEnvObject(data));
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError('Configuration is invalid', issues);
  }

  const cfg = parsed.data;
  cfg.dataset.root = path.resolve(baseDir, cfg.dataset.root);
  cfg.dataset.extensions = cfg.dataset.extensions.map(ext => ext.toLowerCase());
  cfg.export.outputDir = path.resolve(baseDir, cfg.export.outputDir);
  if (cfg.export.overridesFile) {
    cfg.export.overridesFile = path.resolve(baseDir, cfg.export.overridesFile);
  }
  if (cfg.checkpoint.path) {
    cfg.checkpoint.path = path.resolve(baseDir, cfg.checkpoint.path);
  }
  return cfg;
}

export function loadConfig(configPath?: string): AnnotatorConfig {
  const candidates = configPath
    ? [path.resolve(configPath)]
    : [
        path.join(process.cwd(), 'config', 'config.json'),
        path.join(process.cwd(), 'config', 'config.example.json'),
      ];

  const found = candidates.find(candidate => fs.existsSync(candidate));
  if (!found) {
    throw new ConfigError(`No configuration file found (looked in ${candidates.join(', ')})`);
  }
  if (!configPath && path.basename(found) === 'config.example.json') {
    logger.warn('Using example config file. Please create config/config.json for real runs.');
  }

  let data: unknown;
  try {
    data = fs.readJsonSync(found);
  } catch (error) {
    throw new ConfigError(`Could not read ${found}: ${error instanceof Error ? error.message : String(error)}`);
  }

  // Paths inside config/config.json are relative to the project directory
  const baseDir = path.basename(path.dirname(found)) === 'config'
    ? path.dirname(path.dirname(found))
    : path.dirname(found);
  return parseConfig(data, baseDir);
}

export function checkpointPath(cfg: AnnotatorConfig): string {
  return cfg.checkpoint.path ?? path.join(cfg.export.outputDir, 'checkpoint.jsonl');
}

export function getPhase(cfg: AnnotatorConfig, label: string): PhaseDefinition | undefined {
  return cfg.dataset.phases.find(phase => phase.label === label);
}

export function getProviderConfig(cfg: AnnotatorConfig, id: string = cfg.activeProvider): ProviderConfig {
  const found = cfg.providers.find(provider => provider.id === id);
  if (!found) {
    throw new ConfigError(`Unknown provider "${id}" (configured: ${cfg.providers.map(p => p.id).join(', ')})`);
  }
  return found;
}
