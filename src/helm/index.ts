/**
 * Helm chart helpers.
 */

export {
  createHelmContext,
  DEFAULT_HELPER_VALUES,
  type HelmContext,
  type ChartInfo,
  type ReleaseInfo,
  type HelperValues,
} from "./context.js";

export {
  MAX_NAME_LENGTH,
  truncName,
  chartName,
  chartFullname,
  chartLabel,
  selectorLabels,
  commonLabels,
  serviceAccountName,
  configMapName,
  renderLabels,
  type LabelSet,
} from "./helpers.js";

export { generateHelpersTpl } from "./helpers-tpl.js";

export {
  loadChartMetadata,
  chartInfo,
  versionFromTag,
  setChartVersion,
  ChartMetadataSchema,
  ChartFileError,
  DEFAULT_CHART_TAG_PREFIX,
  type ChartMetadata,
  type ChartVersionUpdate,
} from "./chart-file.js";
