import fs from 'node:fs/promises';
import { z } from 'zod';
import {
  ArtifactLoadError,
  ArtifactUnavailableError,
  ScoringError,
  errorMessage
} from '../errors/AppError.js';
import { METRIC, type TelemetrySink } from '../observability/metrics.js';
import { logger } from '../utils/logger.js';
import { columnsFor, type FeatureSchema, type FeatureVector } from './featureAligner.js';

export const ARTIFACT_FORMAT_VERSION = 1;

// Absolute upper bound on tree depth so scoring cost stays bounded
const ABSOLUTE_MAX_DEPTH = 32;

export type Label = 0 | 1;

export type Score = {
  label: Label;
  probability: number;
};

// Compact tree nodes: t=type, f=column index, v=threshold or leaf probability, l/r=children
export type TreeNode =
  | { t: 'l'; v: number }
  | { t: 'n'; f: number; v: number; l: TreeNode; r: TreeNode };

const treeNodeSchema: z.ZodType<TreeNode> = z.lazy(() => z.union([
  z.object({ t: z.literal('l'), v: z.number().min(0).max(1) }),
  z.object({ t: z.literal('n'), f: z.number().int().min(0), v: z.number(), l: treeNodeSchema, r: treeNodeSchema })
]));

const fieldSchema = z.discriminatedUnion('kind', [
  z.object({ name: z.string().min(1), kind: z.literal('numeric') }),
  z.object({
    name: z.string().min(1),
    kind: z.literal('categorical'),
    levels: z.array(z.string().min(1)).min(2),
    reference: z.string().min(1)
  })
]);

const modelSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('logistic'),
    intercept: z.number(),
    coefficients: z.array(z.number()),
    threshold: z.number().min(0).max(1).default(0.5)
  }),
  z.object({
    type: z.literal('forest'),
    max_depth: z.number().int().min(1).max(ABSOLUTE_MAX_DEPTH).default(20),
    trees: z.array(treeNodeSchema).min(1),
    threshold: z.number().min(0).max(1).default(0.5)
  })
]);

export const artifactFileSchema = z.object({
  format_version: z.literal(ARTIFACT_FORMAT_VERSION),
  version: z.string().min(1),
  trained_at: z.string().datetime().optional(),
  schema: z.object({ fields: z.array(fieldSchema).min(1) }),
  columns: z.array(z.string()).optional(),
  model: modelSchema
});

export type ArtifactFile = z.infer<typeof artifactFileSchema>;

export type ModelDefinition = ArtifactFile['model'];

export interface ScoringArtifact {
  readonly version: string;
  readonly trainedAt?: string;
  readonly schema: FeatureSchema;
  readonly columns: readonly string[];
  readonly modelType: ModelDefinition['type'];
  score(vector: FeatureVector): Score;
}

export interface ArtifactSource {
  readonly description: string;
  read(): Promise<string>;
}

export function fileSource(path: string): ArtifactSource {
  return {
    description: path,
    read: () => fs.readFile(path, 'utf8')
  };
}

export function inlineSource(content: unknown, description = 'inline'): ArtifactSource {
  const text = typeof content === 'string' ? content : JSON.stringify(content);
  return { description, read: async () => text };
}

function sigmoid(z: number) {
  return 1 / (1 + Math.exp(-z));
}

function clampProbability(value: number) {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

function treeDepth(node: TreeNode): number {
  return node.t === 'l' ? 0 : 1 + Math.max(treeDepth(node.l), treeDepth(node.r));
}

function maxFeatureIndex(node: TreeNode): number {
  return node.t === 'l' ? -1 : Math.max(node.f, maxFeatureIndex(node.l), maxFeatureIndex(node.r));
}

function traverseTree(root: TreeNode, vector: FeatureVector, maxDepth: number): number {
  let current = root;
  let depth = 0;
  while (current.t === 'n' && depth < maxDepth) {
    // feature <= threshold goes left
    current = (vector[current.f] ?? 0) <= current.v ? current.l : current.r;
    depth += 1;
  }
  return current.t === 'l' ? current.v : 0;
}

function buildScorer(model: ModelDefinition): (vector: FeatureVector) => number {
  if (model.type === 'logistic') {
    const coefficients = [...model.coefficients];
    const intercept = model.intercept;
    return (vector) => {
      let z = intercept;
      for (let i = 0; i < coefficients.length; i += 1) {
        z += (coefficients[i] ?? 0) * (vector[i] ?? 0);
      }
      return sigmoid(z);
    };
  }

  const trees = model.trees;
  const maxDepth = model.max_depth;
  return (vector) => {
    let total = 0;
    for (const tree of trees) {
      total += traverseTree(tree, vector, maxDepth);
    }
    return total / trees.length;
  };
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function checkConsistency(file: ArtifactFile): string[] {
  const problems: string[] = [];
  const names = new Set<string>();

  for (const field of file.schema.fields) {
    if (names.has(field.name)) {
      problems.push(`duplicate field "${field.name}"`);
    }
    names.add(field.name);
    if (field.kind === 'categorical') {
      if (new Set(field.levels).size !== field.levels.length) {
        problems.push(`duplicate levels for "${field.name}"`);
      }
      if (!field.levels.includes(field.reference)) {
        problems.push(`reference level "${field.reference}" of "${field.name}" is not a known level`);
      }
    }
  }

  const derived = columnsFor(file.schema);
  if (file.columns && (file.columns.length !== derived.length || file.columns.some((column, i) => column !== derived[i]))) {
    problems.push(`embedded columns [${file.columns.join(', ')}] do not match schema columns [${derived.join(', ')}]`);
  }

  const model = file.model;
  if (model.type === 'logistic' && model.coefficients.length !== derived.length) {
    problems.push(`expected ${derived.length} coefficients, found ${model.coefficients.length}`);
  }
  if (model.type === 'forest') {
    const maxDepth = model.max_depth;
    model.trees.forEach((tree, i) => {
      if (maxFeatureIndex(tree) >= derived.length) {
        problems.push(`tree ${i} references a column outside the schema`);
      }
      if (treeDepth(tree) > maxDepth) {
        problems.push(`tree ${i} is deeper than max_depth`);
      }
    });
  }
  return problems;
}

/**
 * Builds an immutable artifact from an already parsed artifact file.
 */
export function createArtifact(file: ArtifactFile): ScoringArtifact {
  const problems = checkConsistency(file);
  if (problems.length > 0) {
    throw new ArtifactLoadError('corrupt', `Artifact ${file.version} is inconsistent`, problems);
  }

  const schema = deepFreeze(structuredClone(file.schema));
  const model = deepFreeze(structuredClone(file.model));
  const columns = Object.freeze(columnsFor(schema));
  const scorer = buildScorer(model);

  return Object.freeze({
    version: file.version,
    trainedAt: file.trained_at,
    schema,
    columns,
    modelType: model.type,
    score(vector: FeatureVector): Score {
      if (vector.length !== columns.length) {
        throw new ScoringError(`Vector has ${vector.length} values, artifact ${file.version} expects ${columns.length}`);
      }
      const probability = clampProbability(scorer(vector));
      return { label: probability >= model.threshold ? 1 : 0, probability };
    }
  });
}

export function parseArtifact(text: string): ScoringArtifact {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ArtifactLoadError('corrupt', 'Artifact is not valid JSON', errorMessage(error));
  }

  if (raw === null || typeof raw !== 'object' || !('format_version' in raw)) {
    throw new ArtifactLoadError('corrupt', 'Artifact has no format_version');
  }
  if (raw.format_version !== ARTIFACT_FORMAT_VERSION) {
    throw new ArtifactLoadError(
      'version_mismatch',
      `Artifact format_version ${String(raw.format_version)} is not supported (expected ${ARTIFACT_FORMAT_VERSION})`
    );
  }

  const parsed = artifactFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ArtifactLoadError('corrupt', 'Artifact does not match the expected structure', parsed.error.flatten());
  }
  return createArtifact(parsed.data);
}

export async function loadArtifact(source: ArtifactSource): Promise<ScoringArtifact> {
  let text: string;
  try {
    text = await source.read();
  } catch (error) {
    throw new ArtifactLoadError('unreadable', `Cannot read artifact from ${source.description}`, errorMessage(error));
  }
  return parseArtifact(text);
}

export type ReloadResult =
  | { ok: true; version: string; previousVersion: string | null }
  | { ok: false; error: ArtifactLoadError; version: string | null };

/**
 * Holds the artifact currently used for scoring. Swapping it is a single
 * reference assignment; callers that captured the previous artifact finish
 * against it unchanged.
 */
export class ScoringArtifactAdapter {
  private current: ScoringArtifact | null = null;

  private reloading: Promise<unknown> = Promise.resolve();

  constructor(
    private source: ArtifactSource,
    private readonly metrics?: TelemetrySink
  ) {}

  get artifact(): ScoringArtifact | null {
    return this.current;
  }

  get version(): string | null {
    return this.current?.version ?? null;
  }

  /** Startup load. Failures propagate; the caller decides whether to exit. */
  async load(): Promise<ScoringArtifact> {
    const artifact = await loadArtifact(this.source);
    this.install(artifact);
    logger.info('artifact.loaded', {
      version: artifact.version,
      source: this.source.description,
      columns: artifact.columns.length,
      model: artifact.modelType
    });
    return artifact;
  }

  /**
   * Hot swap. Reloads run one at a time in the order they were requested, so
   * the last request is the one left installed. A failed reload keeps serving
   * the stale artifact.
   */
  reload(source?: ArtifactSource): Promise<ReloadResult> {
    const run = this.reloading.then(() => this.swap(source ?? this.source));
    this.reloading = run.catch(() => undefined);
    return run;
  }

  private async swap(source: ArtifactSource): Promise<ReloadResult> {
    const previousVersion = this.version;
    try {
      const artifact = await loadArtifact(source);
      this.install(artifact);
      this.source = source;
      this.metrics?.increment(METRIC.artifactReloads);
      logger.info('artifact.reloaded', { version: artifact.version, previous_version: previousVersion });
      return { ok: true, version: artifact.version, previousVersion };
    } catch (error) {
      const loadError = error instanceof ArtifactLoadError
        ? error
        : new ArtifactLoadError('unreadable', errorMessage(error));
      this.metrics?.increment(METRIC.artifactReloadFailures);
      logger.error('artifact.reload.failed', {
        reason: loadError.reason,
        error: loadError.message,
        details: loadError.details,
        serving_version: previousVersion
      });
      return { ok: false, error: loadError, version: previousVersion };
    }
  }

  install(artifact: ScoringArtifact) {
    this.current = artifact;
    this.metrics?.set(METRIC.artifactLoaded, 1);
  }

  require(): ScoringArtifact {
    const artifact = this.current;
    if (!artifact) {
      throw new ArtifactUnavailableError();
    }
    return artifact;
  }

  score(vector: FeatureVector): Score & { version: string } {
    const artifact = this.require();
    return { ...artifact.score(vector), version: artifact.version };
  }
}
