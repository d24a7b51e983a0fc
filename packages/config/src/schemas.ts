import { z } from 'zod';

export const MatrixConfigSchema = z.object({
  homeserver: z.string().url(),
  user: z.string().min(1),
  password: z.string().min(1),
  roomId: z.string().min(1),
});

export const TimingConfigSchema = z.object({
  syncTimeoutMs: z.number().int().positive(),
  markerDelayMs: z.number().int().nonnegative(),
  pollTimeoutMs: z.number().int().positive(),
  pollDelayMs: z.number().int().nonnegative(),
  errorBackoffMs: z.number().int().nonnegative(),
  livenessIntervalMs: z.number().int().positive(),
  terminateGraceMs: z.number().int().nonnegative(),
  powerDelaySeconds: z.number().int().nonnegative(),
});

export const AgentConfigSchema = z.object({
  /** Identity that scopes commands, e.g. `PC1` */
  agentName: z.string().min(1).refine((name) => name.trim() === name, {
    message: 'must not have leading or trailing whitespace',
  }),
  matrix: MatrixConfigSchema,
  livenessFile: z.string().min(1),
  persistenceArtifact: z.string().min(1),
  /** Command-line fragments that identify sibling agent processes */
  entryPoints: z.array(z.string().min(1)).min(1),
  timing: TimingConfigSchema,
});

export type MatrixConfig = z.infer<typeof MatrixConfigSchema>;
export type TimingConfig = z.infer<typeof TimingConfigSchema>;
export type AgentConfig = z.infer<typeof AgentConfigSchema>;
