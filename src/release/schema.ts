/**
 * Release target schema.
 *
 * A release target is one independently versioned sub-project (the
 * application, the Helm chart) that gets its own `.releaserc`. Targets are
 * validated once when the project config is loaded and treated as
 * read-only afterwards.
 */

import { z } from "zod";

/**
 * Version bump a commit type triggers. `false` disables releases for it.
 */
export const ReleaseType = z.union([
  z.enum(["major", "premajor", "minor", "preminor", "patch", "prepatch", "prerelease"]),
  z.literal(false),
]);

export type ReleaseType = z.infer<typeof ReleaseType>;

export const ReleaseRuleSchema = z
  .object({
    /** Conventional-commit type, e.g. "feat" */
    type: z.string().min(1),
    release: ReleaseType,
  })
  .strict();

export type ReleaseRule = z.infer<typeof ReleaseRuleSchema>;

export const ReleaseTargetSchema = z
  .object({
    /** Target identifier used on the command line ("app", "chart") */
    name: z
      .string()
      .regex(/^[a-z][a-z0-9-]*$/, "must be lowercase alphanumeric with dashes"),

    /** Where the rendered .releaserc is written, relative to the repo root */
    outputPath: z.string().min(1),

    /** semantic-release tag format; must reference ${version} */
    tagFormat: z
      .string()
      .refine((v) => v.includes("${version}"), "must contain ${version}"),

    /** Shareable configs to extend */
    extends: z.array(z.string().min(1)),

    /** conventional-changelog preset for analysis and notes */
    preset: z.string().min(1),

    releaseRules: z.array(ReleaseRuleSchema),

    /** Footer keywords that mark a breaking change */
    noteKeywords: z.array(z.string().min(1)),

    github: z
      .object({
        /** false disables the success comment, a string sets its template */
        successComment: z.union([z.literal(false), z.string().min(1)]),
      })
      .strict(),

    /** Command run by @semantic-release/exec in the prepare step */
    exec: z.object({ prepareCmd: z.string().min(1) }).strict().optional(),

    /** Files committed back by @semantic-release/git */
    gitAssets: z.array(z.string().min(1)).min(1).optional(),
  })
  .strict();

export type ReleaseTarget = z.infer<typeof ReleaseTargetSchema>;

/**
 * A branch entry in the rendered config.
 */
export interface BranchSpec {
  name: string;
  /** Prerelease channel identifier; absent for the main branch */
  prerelease?: string;
}

/** Option values a plugin entry may carry. */
export type PluginOptionValue =
  | string
  | number
  | boolean
  | PluginOptionValue[]
  | { [key: string]: PluginOptionValue };

export type PluginOptions = { [key: string]: PluginOptionValue };

/** `[pluginName, options]`, the array form semantic-release accepts. */
export type ReleasePlugin = readonly [name: string, options: PluginOptions];

/**
 * The assembled semantic-release document.
 */
export interface ReleaseConfig {
  extends: string[];
  tagFormat: string;
  plugins: ReleasePlugin[];
  branches: BranchSpec[];
}
