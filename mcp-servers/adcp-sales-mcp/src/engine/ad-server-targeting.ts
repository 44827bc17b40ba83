import { z } from 'zod';
import { logger } from '../utils/logger.js';
import {
  UnsupportedTargetingError,
  type TargetingIssue,
  type TargetingOverlay,
} from './core/types.js';

export const DEVICE_CATEGORY_IDS: Readonly<Record<string, number>> = {
  mobile: 30000,
  desktop: 30001,
  tablet: 30002,
  ctv: 30003,
  dooh: 30004,
};

const ENVIRONMENT_BY_MEDIA_TYPE: Readonly<Record<string, 'BROWSER' | 'VIDEO_PLAYER'>> = {
  video: 'VIDEO_PLAYER',
  display: 'BROWSER',
  native: 'BROWSER',
};

/** Custom keys written from managed-only dimensions. */
const MANAGED_CUSTOM_KEYS: ReadonlyMap<string, string> = new Map([
  ['axei', 'axe_include_segment'],
  ['axex', 'axe_exclude_segment'],
]);

/** Namespace of managed signal key-values, reserved whether or not this tenant sets them. */
const MANAGED_KEY_PREFIX = 'aee_';

const stringList = z.array(z.union([z.string(), z.number()]).transform(String));
const keyValues = z.record(z.union([z.string(), z.number()]).transform(String));

const overlaySchema = z.object({
  geo_country_any_of: stringList.optional(),
  geo_country_none_of: stringList.optional(),
  geo_region_any_of: stringList.optional(),
  geo_region_none_of: stringList.optional(),
  geo_metro_any_of: stringList.optional(),
  geo_metro_none_of: stringList.optional(),
  geo_city_any_of: stringList.optional(),
  geo_city_none_of: stringList.optional(),
  geo_zip_any_of: stringList.optional(),
  geo_zip_none_of: stringList.optional(),
  device_type_any_of: stringList.optional(),
  device_type_none_of: stringList.optional(),
  os_any_of: stringList.optional(),
  os_none_of: stringList.optional(),
  browser_any_of: stringList.optional(),
  browser_none_of: stringList.optional(),
  content_cat_any_of: stringList.optional(),
  content_cat_none_of: stringList.optional(),
  keywords_any_of: stringList.optional(),
  keywords_none_of: stringList.optional(),
  media_type_any_of: stringList.optional(),
  media_type_none_of: stringList.optional(),
  connection_type_any_of: stringList.optional(),
  connection_type_none_of: stringList.optional(),
  audiences_any_of: stringList.optional(),
  audiences_none_of: stringList.optional(),
  signals: stringList.optional(),
  frequency_cap: z
    .object({
      suppress_minutes: z.number().int().positive(),
      scope: z.enum(['media_buy', 'package']).default('media_buy'),
    })
    .optional(),
  key_value_pairs: keyValues.optional(),
  axe_include_segment: z.string().optional(),
  axe_exclude_segment: z.string().optional(),
  custom: z.record(z.object({ key_values: keyValues.optional() }).passthrough()).optional(),
});

export interface GeoLocation {
  type: 'COUNTRY' | 'REGION' | 'METRO';
  code: string;
}

export interface FrequencyCap {
  maxImpressions: number;
  numTimeUnits: number;
  timeUnit: 'MINUTE' | 'HOUR' | 'DAY';
}

export interface AdServerTargeting {
  geoTargeting?: { targetedLocations: GeoLocation[]; excludedLocations: GeoLocation[] };
  technologyTargeting?: {
    deviceCategoryIds: number[];
    excludedDeviceCategoryIds: number[];
    operatingSystems: string[];
    excludedOperatingSystems: string[];
    browsers: string[];
    excludedBrowsers: string[];
  };
  contentTargeting?: {
    categories: string[];
    excludedCategories: string[];
    keywords: string[];
    excludedKeywords: string[];
  };
  audienceSegments?: { include: string[]; exclude: string[] };
  customTargeting?: Record<string, string>;
  frequencyCaps?: FrequencyCap[];
  environmentType?: 'BROWSER' | 'VIDEO_PLAYER';
}

export type TranslationOutcome =
  | { ok: true; targeting: AdServerTargeting }
  | { ok: false; error: UnsupportedTargetingError };

function geo(type: GeoLocation['type'], codes: string[] | undefined): GeoLocation[] {
  return (codes || []).map((code) => ({ type, code: code.toUpperCase() }));
}

export function toFrequencyCap(suppressMinutes: number): FrequencyCap {
  if (suppressMinutes < 60) {
    return { maxImpressions: 1, numTimeUnits: suppressMinutes, timeUnit: 'MINUTE' };
  }
  if (suppressMinutes < 1440) {
    return { maxImpressions: 1, numTimeUnits: Math.floor(suppressMinutes / 60), timeUnit: 'HOUR' };
  }
  return { maxImpressions: 1, numTimeUnits: Math.floor(suppressMinutes / 1440), timeUnit: 'DAY' };
}

function deviceIds(
  devices: string[] | undefined,
  dimension: string,
  issues: TargetingIssue[]
): number[] {
  const ids: number[] = [];
  for (const device of devices || []) {
    const id = DEVICE_CATEGORY_IDS[device.toLowerCase()];
    if (id == null) {
      issues.push({ dimension, reason: `device type '${device}' has no category mapping` });
    } else {
      ids.push(id);
    }
  }
  return ids;
}

/**
 * Translates the effective overlay into the ad-server line-item targeting payload. Anything the
 * backend cannot honour fails the translation; nothing is dropped.
 */
/**
 * Translates an access-checked overlay into the ad server's targeting shape.
 * `managedKeys` names the tenant's managed key-value keys; callers may not set those, or any key
 * a managed-only dimension writes, through `custom`.
 */
export function buildAdServerTargeting(
  overlay: TargetingOverlay,
  backend: string,
  managedKeys: readonly string[] = []
): TranslationOutcome {
  const parsed = overlaySchema.safeParse(overlay);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      dimension: String(issue.path[0] ?? 'targeting_overlay'),
      reason: issue.message,
    }));
    return { ok: false, error: new UnsupportedTargetingError(backend, issues) };
  }

  const t = parsed.data;
  const issues: TargetingIssue[] = [];
  const targeting: AdServerTargeting = {};

  if (t.geo_city_any_of?.length || t.geo_city_none_of?.length) {
    issues.push({ dimension: 'geo_city', reason: 'city targeting is not supported; use geo_metro_any_of' });
  }
  if (t.geo_zip_any_of?.length || t.geo_zip_none_of?.length) {
    issues.push({ dimension: 'geo_zip', reason: 'postal code targeting is not supported' });
  }
  if (t.connection_type_any_of?.length || t.connection_type_none_of?.length) {
    issues.push({ dimension: 'connection_type', reason: 'connection type targeting is not supported' });
  }

  const targeted = [
    ...geo('COUNTRY', t.geo_country_any_of),
    ...geo('REGION', t.geo_region_any_of),
    ...geo('METRO', t.geo_metro_any_of),
  ];
  const excluded = [
    ...geo('COUNTRY', t.geo_country_none_of),
    ...geo('REGION', t.geo_region_none_of),
    ...geo('METRO', t.geo_metro_none_of),
  ];
  if (targeted.length > 0 || excluded.length > 0) {
    targeting.geoTargeting = { targetedLocations: targeted, excludedLocations: excluded };
  }

  const included = deviceIds(t.device_type_any_of, 'device_type_any_of', issues);
  const excludedDevices = deviceIds(t.device_type_none_of, 'device_type_none_of', issues);
  if (
    included.length ||
    excludedDevices.length ||
    t.os_any_of?.length ||
    t.os_none_of?.length ||
    t.browser_any_of?.length ||
    t.browser_none_of?.length
  ) {
    targeting.technologyTargeting = {
      deviceCategoryIds: included,
      excludedDeviceCategoryIds: excludedDevices,
      operatingSystems: t.os_any_of || [],
      excludedOperatingSystems: t.os_none_of || [],
      browsers: t.browser_any_of || [],
      excludedBrowsers: t.browser_none_of || [],
    };
  }

  if (
    t.content_cat_any_of?.length ||
    t.content_cat_none_of?.length ||
    t.keywords_any_of?.length ||
    t.keywords_none_of?.length
  ) {
    targeting.contentTargeting = {
      categories: t.content_cat_any_of || [],
      excludedCategories: t.content_cat_none_of || [],
      keywords: t.keywords_any_of || [],
      excludedKeywords: t.keywords_none_of || [],
    };
  }

  const audiences = [...(t.audiences_any_of || []), ...(t.signals || [])];
  if (audiences.length > 0 || t.audiences_none_of?.length) {
    targeting.audienceSegments = { include: audiences, exclude: t.audiences_none_of || [] };
  }

  const mediaTypes = t.media_type_any_of || [];
  if (mediaTypes.length > 1) {
    issues.push({
      dimension: 'media_type_any_of',
      reason: 'only one media type per line item; create one package per media type',
    });
  } else if (mediaTypes.length === 1) {
    const environment = ENVIRONMENT_BY_MEDIA_TYPE[mediaTypes[0]];
    if (environment) {
      targeting.environmentType = environment;
    } else {
      issues.push({ dimension: 'media_type_any_of', reason: `media type '${mediaTypes[0]}' is not supported` });
    }
  }
  if (t.media_type_none_of?.length) {
    issues.push({ dimension: 'media_type_none_of', reason: 'media type exclusion is not supported' });
  }

  const callerCustom = t.custom?.[backend]?.key_values || {};
  const reserved = new Set([...managedKeys, ...Object.keys(t.key_value_pairs || {})]);
  for (const key of Object.keys(callerCustom)) {
    const source =
      MANAGED_CUSTOM_KEYS.get(key) ||
      (reserved.has(key) || key.startsWith(MANAGED_KEY_PREFIX) ? 'key_value_pairs' : undefined);
    if (source) {
      issues.push({ dimension: 'custom', reason: `key '${key}' is reserved for managed ${source}` });
    }
  }
  const custom: Record<string, string> = { ...callerCustom, ...(t.key_value_pairs || {}) };
  if (t.axe_include_segment) custom.axei = t.axe_include_segment;
  if (t.axe_exclude_segment) custom.axex = t.axe_exclude_segment;
  if (Object.keys(custom).length > 0) targeting.customTargeting = custom;

  if (t.frequency_cap) targeting.frequencyCaps = [toFrequencyCap(t.frequency_cap.suppress_minutes)];

  if (issues.length > 0) {
    logger.info('Targeting overlay cannot be fulfilled', { backend, issues });
    return { ok: false, error: new UnsupportedTargetingError(backend, issues) };
  }

  logger.debug('Built ad-server targeting', { backend, keys: Object.keys(targeting) });
  return { ok: true, targeting };
}
