/**
 * Project configuration schema.
 *
 * One resolved ProjectConfig drives every generator: the release targets
 * that get a `.releaserc`, the container image definition, and where the
 * chart lives. It is validated once and frozen; the CLIs never mutate it.
 */

import { z } from "zod";
import { ReleaseTargetSchema } from "../../release/schema.js";
import {
  DockerImageSpecSchema,
  DockerImageOverridesSchema,
} from "../../docker/schema.js";

export const ChartSettingsSchema = z
  .object({
    /** Path to Chart.yaml */
    chartFile: z.string().min(1),
    /** Where the generated _helpers.tpl is written */
    helpersFile: z.string().min(1),
    /** Prefix of chart release tags, matching the chart target's tagFormat */
    tagPrefix: z.string().min(1),
  })
  .strict();

export type ChartSettings = z.infer<typeof ChartSettingsSchema>;

export const ProjectConfigSchema = z
  .object({
    /** Branch that publishes regular releases; others publish prereleases */
    mainBranch: z.string().min(1),

    targets: z
      .array(ReleaseTargetSchema)
      .min(1)
      .superRefine((targets, ctx) => {
        const names = new Set<string>();
        const outputs = new Set<string>();
        targets.forEach((target, index) => {
          if (names.has(target.name)) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              path: [index, "name"],
              message: `duplicate target name "${target.name}"`,
            });
          }
          if (outputs.has(target.outputPath)) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              path: [index, "outputPath"],
              message: `output path "${target.outputPath}" is used by another target`,
            });
          }
          names.add(target.name);
          outputs.add(target.outputPath);
        });
      }),

    image: DockerImageSpecSchema,

    chart: ChartSettingsSchema,
  })
  .strict();

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;

/**
 * Shape of `release-glue.config.json`. Every section is optional and merged
 * over the defaults; targets are matched by name.
 */
export const ProjectConfigFileSchema = z
  .object({
    mainBranch: z.string().min(1).optional(),
    targets: z
      .array(ReleaseTargetSchema.partial().extend({ name: ReleaseTargetSchema.shape.name }))
      .optional(),
    image: DockerImageOverridesSchema.optional(),
    chart: ChartSettingsSchema.partial().optional(),
  })
  .strict();

export type ProjectConfigFile = z.infer<typeof ProjectConfigFileSchema>;
