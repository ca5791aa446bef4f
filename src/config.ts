/**
 * Configuration for the pipeline and the printer.
 *
 * Code callers pass plain option objects; `parsePipelineConfig` validates the
 * JSON form of the same settings.
 */

import { z } from "zod/v4";
import { ErrorCodes, LoweringError } from "./errors";
import type { LogLevel } from "./logger";
import { Logger, silentLogger } from "./logger";
import type { PassName } from "./passes/pass";
import { isPassName } from "./passes/pass";

export interface PipelineConfig {
  /** Per-pass enablement; unlisted passes keep their default */
  passes?: Partial<Record<PassName, boolean>>;
  /** Parameter name carrying the instance in struct methods (default: "struct") */
  instanceParam?: string;
  logger?: Logger;
}

export const DEFAULT_PIPELINE_CONFIG: Required<PipelineConfig> = {
  passes: {},
  instanceParam: "struct",
  logger: silentLogger,
};

/** Pipeline settings plus the printer's indentation */
export interface LoweringConfig extends PipelineConfig {
  indent?: string;
}

const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const satisfies readonly LogLevel[];

export const LoweringConfigSchema = z.strictObject({
  passes: z.record(z.string(), z.boolean()).optional(),
  instanceParam: z.string().regex(/^[a-z_][A-Za-z0-9_]*$/, "must be a variable name").optional(),
  indent: z.string().regex(/^( +|\t+)$/, "must be spaces or tabs").optional(),
  logLevel: z.enum(LOG_LEVELS).optional(),
});

/**
 * Validate a JSON configuration document.
 * Throws LoweringError (InvalidConfig) listing every problem found.
 */
export function parsePipelineConfig(json: unknown): LoweringConfig {
  const error = new LoweringError(ErrorCodes.InvalidConfig, "Invalid lowering configuration", "config");

  const parsed = LoweringConfigSchema.safeParse(json);
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      const path = issue.path.length > 0 ? issue.path.map(String).join(".") : "<root>";
      error.addNote(`${path}: ${issue.message}`);
    }
    throw error;
  }

  const doc = parsed.data;
  const passes: Partial<Record<PassName, boolean>> = {};
  for (const [name, enabled] of Object.entries(doc.passes ?? {})) {
    if (isPassName(name)) passes[name] = enabled;
    else error.addNote(`passes.${name}: unknown pass`);
  }
  if (error.notes.length > 0) throw error;

  return {
    passes,
    ...(doc.instanceParam !== undefined ? { instanceParam: doc.instanceParam } : {}),
    ...(doc.indent !== undefined ? { indent: doc.indent } : {}),
    ...(doc.logLevel !== undefined ? { logger: new Logger({ level: doc.logLevel, namespace: "lowering" }) } : {}),
  };
}
