/**
 * Configuration types for the validator
 */

import { z } from 'zod';

/**
 * Complete validator configuration
 */
export interface ValidatorConfig {
  cycles: CycleRulesConfig;
  connections: ConnectionRulesConfig;
  imports: ImportRulesConfig;
  ordering: OrderingConfig;
  limits: LimitsConfig;
  registry: RegistryConfig;
}

export interface CycleRulesConfig {
  /** `maxIterations` above this is reported as CYC006 */
  maxIterationsThreshold: number;
}

export interface ConnectionRulesConfig {
  /** Field names never reported as suspicious */
  commonFieldNames: string[];
  /** Edit distance from a common name at which a field counts as a likely typo */
  typoDistance: number;
}

export interface ImportRulesConfig {
  /** Modules whose unused imports are reported as IMP008 */
  heavyModules: string[];
  /** Package name the SDK is published under */
  sdkRoot: string;
}

export interface OrderingConfig {
  /** How same-line, same-severity diagnostics are ordered */
  tieBreak: 'code' | 'none';
}

export interface LimitsConfig {
  /** Wall-clock budget per request in milliseconds; 0 disables it */
  timeoutMs: number;
  maxNestingDepth: number;
}

export interface RegistryConfig {
  /** Extra node types layered over the built-in catalogue */
  nodeTypes: Record<string, string[]>;
}

export const partialConfigSchema = z
  .object({
    cycles: z
      .object({ maxIterationsThreshold: z.number().int().positive() })
      .partial()
      .strict()
      .optional(),
    connections: z
      .object({
        commonFieldNames: z.array(z.string()),
        typoDistance: z.number().int().min(0),
      })
      .partial()
      .strict()
      .optional(),
    imports: z
      .object({
        heavyModules: z.array(z.string()),
        sdkRoot: z.string().min(1, 'sdkRoot cannot be empty'),
      })
      .partial()
      .strict()
      .optional(),
    ordering: z
      .object({ tieBreak: z.enum(['code', 'none']) })
      .partial()
      .strict()
      .optional(),
    limits: z
      .object({
        timeoutMs: z.number().int().min(0),
        maxNestingDepth: z.number().int().positive(),
      })
      .partial()
      .strict()
      .optional(),
    registry: z
      .object({ nodeTypes: z.record(z.string(), z.array(z.string())) })
      .partial()
      .strict()
      .optional(),
  })
  .strict();

/**
 * Partial configuration, as read from a file, the environment or overrides
 */
export type PartialValidatorConfig = z.infer<typeof partialConfigSchema>;
