import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { pipelineConfigSchema } from '../../application/config-schema.js';
import type { PipelineConfig } from '../../application/config-schema.js';
import { ConfigError } from '../../domain/index.js';
import { parseSimpleYaml } from './simple-yaml.js';
import type { YamlSection } from './simple-yaml.js';

type Env = Readonly<Record<string, string | undefined>>;

/** Config key → [YAML key under `pipeline:`, environment variable]. */
const SOURCES = {
  feedUrl: ['feed_url', 'FEED_URL'],
  pollIntervalSeconds: ['poll_interval_seconds', 'POLL_INTERVAL_SECONDS'],
  retentionWindowSeconds: ['retention_window_seconds', 'RETENTION_WINDOW_SECONDS'],
  fetchTimeoutSeconds: ['fetch_timeout_seconds', 'FETCH_TIMEOUT_SECONDS'],
  clusterRadiusKm: ['cluster_radius_km', 'CLUSTER_RADIUS_KM'],
  clusterWindowSeconds: ['cluster_window_seconds', 'CLUSTER_WINDOW_SECONDS'],
  magnitudeThresholds: ['magnitude_thresholds', 'MAGNITUDE_THRESHOLDS'],
  timelineBinSeconds: ['timeline_bin_seconds', 'TIMELINE_BIN_SECONDS'],
  maxBackoffSeconds: ['max_backoff_seconds', 'MAX_BACKOFF_SECONDS'],
  minClusterEventsAboveModerate: ['min_cluster_events_above_moderate', 'MIN_CLUSTER_EVENTS_ABOVE_MODERATE'],
  rateSpikePerHour: ['rate_spike_per_hour', 'RATE_SPIKE_PER_HOUR'],
  rateSpikeMinEvents: ['rate_spike_min_events', 'RATE_SPIKE_MIN_EVENTS'],
} as const satisfies Record<keyof PipelineConfig, readonly [string, string]>;

/**
 * Numeric-looking strings become numbers; everything else is passed
 * through untouched so the schema reports it.
 */
function coerceNumber(value: unknown): unknown {
  if (typeof value !== 'string' || value.trim() === '') return value;
  const n = Number(value);
  return Number.isNaN(n) ? value : n;
}

function coerce(key: keyof PipelineConfig, value: unknown): unknown {
  if (key === 'feedUrl') return value;
  if (key === 'magnitudeThresholds') {
    const items = typeof value === 'string' ? value.split(',') : value;
    return Array.isArray(items) ? items.map((item: unknown) => coerceNumber(typeof item === 'string' ? item.trim() : item)) : items;
  }
  return coerceNumber(value);
}

function readYamlSection(filePath: string): YamlSection {
  if (!existsSync(filePath)) return {};
  return parseSimpleYaml(readFileSync(filePath, 'utf-8'))['pipeline'] ?? {};
}

/**
 * Loads and validates the pipeline configuration.
 *
 * Sources, later wins: schema defaults, `config/pipeline.yaml`
 * (section `pipeline:`), environment variables. A missing file is not
 * an error; an invalid merged result throws ConfigError.
 */
export function loadPipelineConfig(
  env: Env = process.env,
  configPath?: string,
): PipelineConfig {
  const filePath = configPath ?? resolve(process.cwd(), 'config', 'pipeline.yaml');
  const yaml = readYamlSection(filePath);

  const raw: Record<string, unknown> = {};
  for (const key of Object.keys(SOURCES)) {
    if (!isConfigKey(key)) continue;
    const [yamlKey, envVar] = SOURCES[key];
    const fromEnv = env[envVar];
    const value = fromEnv !== undefined && fromEnv !== '' ? fromEnv : yaml[yamlKey];
    if (value !== undefined) raw[key] = coerce(key, value);
  }

  const parsed = pipelineConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`),
    );
  }
  return parsed.data;
}

function isConfigKey(key: string): key is keyof PipelineConfig {
  return key in SOURCES;
}
