import { z } from 'zod';

/**
 * Magnitude breakpoints: lower bounds of light, moderate, strong, major.
 * Must be strictly increasing.
 */
export const magnitudeThresholdsSchema = z
  .tuple([z.number().finite(), z.number().finite(), z.number().finite(), z.number().finite()])
  .refine(
    ([light, moderate, strong, major]) => light < moderate && moderate < strong && strong < major,
    { message: 'Magnitude thresholds must be strictly increasing' },
  );

/**
 * Zod schema for the pipeline configuration.
 *
 * Everything except `feedUrl` has a default. Parsing failure is the
 * one error that stops the process at startup.
 */
export const pipelineConfigSchema = z.object({
  feedUrl: z.string().url({ message: 'feedUrl must be a valid URL' }),
  pollIntervalSeconds: z.number().int().min(1).default(60),
  retentionWindowSeconds: z.number().int().min(60).default(7 * 24 * 3600),
  fetchTimeoutSeconds: z.number().int().min(1).default(10),
  clusterRadiusKm: z.number().finite().positive().default(50),
  clusterWindowSeconds: z.number().finite().positive().default(24 * 3600),
  magnitudeThresholds: magnitudeThresholdsSchema.default([4, 5, 6, 7]),
  timelineBinSeconds: z.number().int().min(60).default(900),
  maxBackoffSeconds: z.number().int().min(1).default(600),
  minClusterEventsAboveModerate: z.number().int().min(1).default(1),
  rateSpikePerHour: z.number().finite().positive().default(120),
  rateSpikeMinEvents: z.number().int().min(1).default(5),
});

export type PipelineConfig = z.infer<typeof pipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof pipelineConfigSchema>;
