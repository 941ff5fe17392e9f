import { z } from "zod";
import { ConfigurationError } from "./errors";
import { PROTOCOL_IDS } from "./protocol";
import { DEFAULT_LIMITS } from "./r1cs/types";

export const PipelineConfigZ = z.object({
  /** Input container; there is no search for it */
  r1csPath: z.string().min(1),
  proofPath: z.string().min(1).optional(),
  verifyingKeyPath: z.string().min(1).optional(),
  publicSignalsPath: z.string().min(1).optional(),
  outDir: z.string().min(1).default("."),
  layout: z.enum(["sectioned", "flat"]).default("sectioned"),
  protocol: z.enum(PROTOCOL_IDS).default("dip69-mode0"),
  chunkCountPolicy: z.enum(["strict", "pad"]).default("strict"),
  limits: z
    .object({
      maxTermsPerCombination: z.number().int().positive().default(DEFAULT_LIMITS.maxTermsPerCombination),
      maxConstraints: z.number().int().positive().default(DEFAULT_LIMITS.maxConstraints),
      maxFieldElementSize: z.number().int().min(1).max(64).default(DEFAULT_LIMITS.maxFieldElementSize),
    })
    .default({}),
  compat: z
    .object({
      redirectOutOfRangeWires: z.boolean().default(false),
    })
    .default({}),
  /** Check the proof with the proving backend before packaging it */
  verifyWithBackend: z.boolean().default(false),
});

export type PipelineConfig = z.output<typeof PipelineConfigZ>;
export type PipelineConfigInput = z.input<typeof PipelineConfigZ>;

export function parseConfig(raw: unknown): PipelineConfig {
  const result = PipelineConfigZ.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`invalid configuration: ${issues}`, { cause: result.error });
  }
  return result.data;
}
