/**
 * Rendering context for chart helpers: the subset of Helm's built-in
 * objects (`.Chart`, `.Release`, `.Values`) the helpers read.
 */

export interface ChartInfo {
  name: string;
  version: string;
  appVersion?: string;
}

export interface ReleaseInfo {
  name: string;
  /** Value of `.Release.Service`; "Helm" for real installs */
  service: string;
}

export interface HelperValues {
  nameOverride?: string;
  fullnameOverride?: string;
  serviceAccount: {
    create: boolean;
    name?: string;
  };
}

export interface HelmContext {
  chart: ChartInfo;
  release: ReleaseInfo;
  values: HelperValues;
}

export const DEFAULT_HELPER_VALUES: HelperValues = {
  nameOverride: "",
  fullnameOverride: "",
  serviceAccount: { create: true, name: "" },
};

export function createHelmContext(
  chart: ChartInfo,
  releaseName: string,
  values: HelperValues = DEFAULT_HELPER_VALUES
): HelmContext {
  return {
    chart,
    release: { name: releaseName, service: "Helm" },
    values,
  };
}
