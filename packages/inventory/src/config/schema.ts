import { minimatch } from "minimatch";
import { z } from "zod";

import { ENGINES } from "../constants.js";
import { FIELD_TOKENS } from "../report/fields.js";
import { REPORT_FORMATS } from "../report/index.js";

/**
 * Zod schema for a cluster name filter (shell-style wildcard)
 */
const clusterFilterSchema = z.string().superRefine((pattern, ctx) => {
  if (pattern.length === 0) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Invalid cluster filter: empty pattern" });
    return;
  }
  if (minimatch.makeRe(pattern, { nobrace: true, noext: true, nonegate: true }) === false) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid cluster filter: "${pattern}" - invalid pattern syntax`,
    });
  }
});

/**
 * Zod schema for cachescope.toml configuration
 */
export const configSchema = z
  .object({
    /** Home region */
    region: z.string().min(1).optional(),
    /** Named AWS profile */
    profile: z.string().min(1).optional(),
    engines: z.array(z.enum(ENGINES)).min(1).optional(),
    cluster: clusterFilterSchema.optional(),
    fields: z.union([z.literal("all"), z.array(z.enum(FIELD_TOKENS)).min(1)]).optional(),
    format: z.enum(REPORT_FORMATS).optional(),
    /** Output file, or a directory (trailing slash) for a generated name */
    output: z.string().min(1).optional(),
    /** Max regions queried at once */
    concurrency: z.number().int().positive().optional(),
    verbose: z.boolean().optional(),
  })
  .strict();

export type Config = z.infer<typeof configSchema>;
