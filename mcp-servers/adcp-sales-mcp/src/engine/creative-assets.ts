import type { FormatDefinition, JsonObject } from './core/types.js';

export type CreativeType = 'hosted_asset' | 'html5' | 'third_party_tag' | 'vast' | 'native';

export type SnippetType = 'html' | 'javascript' | 'iframe' | 'vast_xml' | 'vast_url';

/** Creative fields as submitted by the buyer; at most one serving source is expected. */
export interface CreativeSubmission {
  creativeId: string;
  name: string;
  formatId: string;
  mediaUrl?: string;
  clickUrl?: string;
  snippet?: string;
  snippetType?: SnippetType;
  templateVariables?: JsonObject;
  width?: number;
  height?: number;
  durationMs?: number;
  packageIds: string[];
}

export interface CreativeDimensions {
  width: number;
  height: number;
}

const HTML5_EXTENSIONS = ['.html', '.htm', '.html5', '.zip'];
const HTML_SNIPPET_PREFIXES = ['<script', '<div', '<iframe', '<!doctype', '<html'];
const SIZE_TOKEN = /^(\d+)x(\d+)$/;

export function parseSizeFromFormatId(formatId: string): CreativeDimensions | undefined {
  for (const token of formatId.toLowerCase().split('_')) {
    const match = SIZE_TOKEN.exec(token);
    if (match) {
      return { width: Number(match[1]), height: Number(match[2]) };
    }
  }
  return undefined;
}

/**
 * Explicit dimensions first, then the resolved format's requirements, then a `WxH` token in the
 * format id. Undefined means the asset is unmeasured.
 */
export function resolveCreativeDimensions(
  creative: Pick<CreativeSubmission, 'width' | 'height' | 'formatId'>,
  format?: FormatDefinition
): CreativeDimensions | undefined {
  if (creative.width && creative.height) {
    return { width: creative.width, height: creative.height };
  }
  const required = format?.requirements;
  if (required?.width && required.height) {
    return { width: required.width, height: required.height };
  }
  return parseSizeFromFormatId(creative.formatId);
}

function isHtmlSnippet(content: string): boolean {
  const normalized = content.trim().toLowerCase();
  return HTML_SNIPPET_PREFIXES.some((prefix) => normalized.startsWith(prefix));
}

export function classifyCreative(creative: CreativeSubmission): CreativeType {
  if (creative.snippet && creative.snippetType) {
    return creative.snippetType === 'vast_xml' || creative.snippetType === 'vast_url'
      ? 'vast'
      : 'third_party_tag';
  }
  if (creative.templateVariables && Object.keys(creative.templateVariables).length > 0) {
    return 'native';
  }
  if (creative.mediaUrl) {
    const url = creative.mediaUrl.toLowerCase();
    const formatId = creative.formatId.toLowerCase();
    if (
      HTML5_EXTENSIONS.some((ext) => url.endsWith(ext)) ||
      formatId.includes('html5') ||
      formatId.includes('rich_media')
    ) {
      return 'html5';
    }
    return 'hosted_asset';
  }
  if (creative.snippet && isHtmlSnippet(creative.snippet)) return 'third_party_tag';
  if (creative.formatId.includes('native')) return 'native';
  return 'hosted_asset';
}

/** Third-party tags report declared sizes; they are never measured server-side. */
export function isMeasurable(type: CreativeType): boolean {
  return type === 'hosted_asset' || type === 'html5';
}
