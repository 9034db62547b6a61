/**
 * YAML serialization for `.releaserc` documents.
 *
 * Output layout:
 *
 *   extends:
 *     - semantic-release-monorepo
 *   tagFormat: v${version}
 *   plugins:
 *     - - "@semantic-release/commit-analyzer"
 *       - preset: conventionalcommits
 *         releaseRules:
 *           - { type: feat, release: minor }
 *   branches:
 *     - { name: main }
 *     - { name: feature/x/y, prerelease: x }
 *
 * Lists whose entries are all flat maps (release rules, branches) are written
 * one flow map per line.
 */

import { Document, isMap, isScalar, visit } from "yaml";

import type { ReleaseConfig } from "./schema.js";

export function renderReleaseConfig(config: ReleaseConfig): string {
  const doc = new Document(
    {
      extends: config.extends,
      tagFormat: config.tagFormat,
      plugins: config.plugins,
      branches: config.branches,
    },
    { aliasDuplicateObjects: false }
  );

  visit(doc, {
    Seq(_, seq) {
      if (!seq.items.every(isMap)) {
        return;
      }
      for (const item of seq.items) {
        if (isMap(item) && item.items.every((pair) => isScalar(pair.value))) {
          item.flow = true;
        }
      }
    },
  });

  return doc.toString({ lineWidth: 0 });
}
