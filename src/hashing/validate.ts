import { z } from "zod/v4";
import { UINT_MAX } from "../utils/uint.js";
import type { HasherConfig } from "./types.js";

const positiveUint = (max: number) => z.number().int().min(1).max(max);

// Only presence is required of the variant here; whether it is supported is
// decided by parseVariant, which raises InvalidVariantError instead.
export const HasherConfigSchema = z.object({
  variant: z.string().min(1),
  saltLength: positiveUint(UINT_MAX[32]),
  keyLength: positiveUint(UINT_MAX[32]),
  memoryCost: positiveUint(UINT_MAX[32]),
  iterations: positiveUint(UINT_MAX[32]),
  parallelism: positiveUint(UINT_MAX[8]),
});

export interface ConfigIssue {
  field: string;
  message: string;
}

export type ConfigValidation =
  | { ok: true }
  | { ok: false; issues: ConfigIssue[] };

/**
 * Check that a configuration may be used to derive keys: variant set, every
 * numeric field a positive integer inside its bit width.
 */
export function validateConfiguration(config: HasherConfig): ConfigValidation {
  const result = HasherConfigSchema.safeParse(config);
  if (result.success) {
    return { ok: true };
  }
  return {
    ok: false,
    issues: result.error.issues.map((issue) => ({
      field: issue.path.map(String).join("."),
      message: issue.message,
    })),
  };
}
