/**
 * Chart naming and label helpers.
 *
 * These mirror the partials in the chart's `_helpers.tpl` so names and
 * labels can be computed (and tested) outside of Helm. Semantics follow the
 * Sprig functions the template uses: `default` treats "" as unset, `trunc`
 * cuts to a length, `trimSuffix` removes a single occurrence.
 */

import type { HelmContext } from "./context.js";

/** Kubernetes DNS-1123 label limit */
export const MAX_NAME_LENGTH = 63;

export type LabelSet = Record<string, string>;

function withDefault(value: string | undefined, fallback: string): string {
  return value !== undefined && value !== "" ? value : fallback;
}

/**
 * `trunc 63 | trimSuffix "-"`
 */
export function truncName(value: string): string {
  const cut = value.slice(0, MAX_NAME_LENGTH);
  return cut.endsWith("-") ? cut.slice(0, -1) : cut;
}

export function chartName(ctx: HelmContext): string {
  return truncName(withDefault(ctx.values.nameOverride, ctx.chart.name));
}

/**
 * Fully qualified app name. When the release name already contains the
 * chart name it is used on its own.
 */
export function chartFullname(ctx: HelmContext): string {
  const override = ctx.values.fullnameOverride;
  if (override !== undefined && override !== "") {
    return truncName(override);
  }
  const name = withDefault(ctx.values.nameOverride, ctx.chart.name);
  if (ctx.release.name.includes(name)) {
    return truncName(ctx.release.name);
  }
  return truncName(`${ctx.release.name}-${name}`);
}

/**
 * Value of the `helm.sh/chart` label: `<name>-<version>` with build
 * metadata's `+` replaced, since label values may not contain it.
 */
export function chartLabel(ctx: HelmContext): string {
  return truncName(`${ctx.chart.name}-${ctx.chart.version}`.replace(/\+/g, "_"));
}

export function selectorLabels(ctx: HelmContext): LabelSet {
  return {
    "app.kubernetes.io/name": chartName(ctx),
    "app.kubernetes.io/instance": ctx.release.name,
  };
}

export function commonLabels(ctx: HelmContext): LabelSet {
  const labels: LabelSet = {
    "helm.sh/chart": chartLabel(ctx),
    ...selectorLabels(ctx),
  };
  if (ctx.chart.appVersion) {
    labels["app.kubernetes.io/version"] = ctx.chart.appVersion;
  }
  labels["app.kubernetes.io/managed-by"] = ctx.release.service;
  return labels;
}

export function serviceAccountName(ctx: HelmContext): string {
  const { create, name } = ctx.values.serviceAccount;
  return create ? withDefault(name, chartFullname(ctx)) : withDefault(name, "default");
}

export function configMapName(ctx: HelmContext): string {
  return truncName(`${chartFullname(ctx)}-config`);
}

/** Labels whose values the template pipes through `quote`. */
const QUOTED_LABELS = new Set(["app.kubernetes.io/version"]);

/**
 * Render labels the way `include "<chart>.labels" . | nindent <n>` does.
 */
export function renderLabels(labels: LabelSet, indent = 0): string {
  const pad = " ".repeat(indent);
  return Object.entries(labels)
    .map(([key, value]) =>
      `${pad}${key}: ${QUOTED_LABELS.has(key) ? JSON.stringify(value) : value}`
    )
    .join("\n");
}
