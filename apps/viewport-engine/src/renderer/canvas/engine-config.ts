/**
 * Engine Configuration Module
 *
 * Tunables for culling, clustering, caching and the per-tick build budget.
 * Overrides are merged over the defaults and validated once, at engine
 * construction; an invalid value throws `EngineConfigError`.
 *
 * @module engine-config
 */

import { EngineConfigError, type ConfigIssue } from './errors';
import type { Point, Size } from './geometry';

/**
 * Viewport engine configuration
 */
export interface EngineConfig {
  /** Lowest zoom (screen pixels per world unit) */
  minZoom: number;

  /** Highest zoom */
  maxZoom: number;

  /** Items held by a quadtree node before it subdivides */
  maxItemsPerNode: number;

  /** Quadtree depth at which nodes stop subdividing */
  maxDepth: number;

  /** World units added around the item union when sizing the index root */
  boundsMargin: number;

  /** Level-of-detail reduction runs only below this zoom */
  lodZoomThreshold: number;

  /** Candidate sets smaller than this are never reduced */
  lodMinItems: number;

  /** Cluster radius in screen pixels (world radius = threshold / zoom) */
  clusterPixelThreshold: number;

  /** Clusters larger than this collapse to one representative */
  clusterSizeCutoff: number;

  /** Below this zoom the stricter deep-zoom cutoff applies */
  deepZoomThreshold: number;

  /** Cluster cutoff used below `deepZoomThreshold` */
  deepZoomClusterSizeCutoff: number;

  /** Maximum cached artifacts */
  cacheCapacity: number;

  /** Build invocations allowed per tick */
  maxBuildsPerTick: number;

  /** Wall-clock budget per tick (ms) */
  tickBudgetMs: number;

  /** Floor for screen-space width/height (px) */
  minScreenSize: number;

  /** Log per-batch diagnostics */
  debug: boolean;
}

export const DEFAULT_ENGINE_CONFIG: Readonly<EngineConfig> = Object.freeze({
  minZoom: 0.1,
  maxZoom: 10,
  maxItemsPerNode: 16,
  maxDepth: 8,
  boundsMargin: 100,
  lodZoomThreshold: 0.5,
  lodMinItems: 100,
  clusterPixelThreshold: 50,
  clusterSizeCutoff: 5,
  deepZoomThreshold: 0.3,
  deepZoomClusterSizeCutoff: 3,
  cacheCapacity: 1000,
  maxBuildsPerTick: 10,
  tickBudgetMs: 16, // ~60fps frame
  minScreenSize: 1,
  debug: false,
});

type NumericKey = {
  [K in keyof EngineConfig]: EngineConfig[K] extends number ? K : never;
}[keyof EngineConfig];

const POSITIVE_KEYS: NumericKey[] = [
  'minZoom',
  'maxZoom',
  'maxItemsPerNode',
  'clusterPixelThreshold',
  'cacheCapacity',
  'maxBuildsPerTick',
  'tickBudgetMs',
  'minScreenSize',
];

const NON_NEGATIVE_KEYS: NumericKey[] = [
  'maxDepth',
  'boundsMargin',
  'lodZoomThreshold',
  'lodMinItems',
  'clusterSizeCutoff',
  'deepZoomThreshold',
  'deepZoomClusterSizeCutoff',
];

const INTEGER_KEYS: NumericKey[] = [
  'maxItemsPerNode',
  'maxDepth',
  'lodMinItems',
  'clusterSizeCutoff',
  'deepZoomClusterSizeCutoff',
  'cacheCapacity',
  'maxBuildsPerTick',
];

/**
 * Collect every problem with a candidate configuration.
 */
export function validateEngineConfig(config: EngineConfig): ConfigIssue[] {
  const issues: ConfigIssue[] = [];

  for (const key of [...POSITIVE_KEYS, ...NON_NEGATIVE_KEYS]) {
    if (!Number.isFinite(config[key])) {
      issues.push({ path: [key], message: `${key} must be a finite number`, code: 'not_finite' });
    }
  }

  for (const key of POSITIVE_KEYS) {
    if (Number.isFinite(config[key]) && config[key] <= 0) {
      issues.push({ path: [key], message: `${key} must be greater than 0`, code: 'not_positive' });
    }
  }

  for (const key of NON_NEGATIVE_KEYS) {
    if (Number.isFinite(config[key]) && config[key] < 0) {
      issues.push({ path: [key], message: `${key} must not be negative`, code: 'negative' });
    }
  }

  for (const key of INTEGER_KEYS) {
    if (Number.isFinite(config[key]) && !Number.isInteger(config[key])) {
      issues.push({ path: [key], message: `${key} must be an integer`, code: 'not_integer' });
    }
  }

  if (config.maxZoom < config.minZoom) {
    issues.push({
      path: ['maxZoom'],
      message: `maxZoom (${config.maxZoom}) must be >= minZoom (${config.minZoom})`,
      code: 'invalid_range',
    });
  }

  return issues;
}

/**
 * Merge overrides over the defaults and validate the result.
 *
 * @throws EngineConfigError when any value is out of range
 */
export function resolveEngineConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  const config: EngineConfig = { ...DEFAULT_ENGINE_CONFIG, ...overrides };
  const issues = validateEngineConfig(config);

  if (issues.length > 0) {
    const summary = issues.map(issue => issue.message).join('; ');
    throw new EngineConfigError(`Invalid engine configuration: ${summary}`, issues);
  }

  return config;
}

/**
 * Starting camera and viewport handed to the engine alongside the config.
 */
export interface InitialView {
  origin?: Point;
  zoom?: number;
  viewportSize: Size;
}

export function validateInitialView(view: InitialView): ConfigIssue[] {
  const issues: ConfigIssue[] = [];
  const finite = (path: (string | number)[], value: number): boolean => {
    if (Number.isFinite(value)) return true;
    issues.push({ path, message: `${path.join('.')} must be a finite number`, code: 'not_finite' });
    return false;
  };

  if (view.origin) {
    finite(['initialOrigin', 'x'], view.origin.x);
    finite(['initialOrigin', 'y'], view.origin.y);
  }

  if (view.zoom !== undefined && finite(['initialZoom'], view.zoom) && view.zoom <= 0) {
    issues.push({ path: ['initialZoom'], message: 'initialZoom must be greater than 0', code: 'not_positive' });
  }

  for (const key of ['width', 'height'] as const) {
    const value = view.viewportSize[key];
    if (finite(['viewportSize', key], value) && value < 0) {
      issues.push({ path: ['viewportSize', key], message: `viewportSize.${key} must not be negative`, code: 'negative' });
    }
  }

  return issues;
}

/**
 * @throws EngineConfigError when the starting camera or viewport is unusable
 */
export function assertInitialView(view: InitialView): void {
  const issues = validateInitialView(view);
  if (issues.length > 0) {
    const summary = issues.map(issue => issue.message).join('; ');
    throw new EngineConfigError(`Invalid initial view: ${summary}`, issues);
  }
}
