import { TemplateRenderError } from './errors';
import type { DashboardConfig } from './schema';

const PLACEHOLDER = /\{\{\s*([a-z_]+)\s*\}\}/g;

const SCRIPT_ESCAPES: Record<string, string> = {
  '<': '\\u003c',
  '>': '\\u003e',
  '&': '\\u0026',
  '\u2028': '\\u2028',
  '\u2029': '\\u2029'
};

const ATTRIBUTE_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '"': '&quot;',
  "'": '&#39;',
  '<': '&lt;',
  '>': '&gt;'
};

/** Snapshot JSON safe to inline inside a `<script>` element. */
export const toScriptJson = (value: unknown): string =>
  JSON.stringify(value).replace(/[<>&\u2028\u2029]/g, (char) => SCRIPT_ESCAPES[char] ?? char);

export const escapeAttribute = (value: string): string =>
  value.replace(/[&"'<>]/g, (char) => ATTRIBUTE_ESCAPES[char] ?? char);

export const toDataUri = (bytes: Uint8Array, mimeType = 'image/png'): string =>
  `data:${mimeType};base64,${Buffer.from(bytes).toString('base64')}`;

export const encodeSnapshot = (snapshot: DashboardConfig): string => JSON.stringify(snapshot);

/**
 * Fills `{{ config_json }}` and `{{ icon_data_uri }}` in the page template.
 * Any other placeholder is an error.
 */
export const renderPage = (template: string, snapshot: DashboardConfig, iconDataUri: string): string => {
  const values: Record<string, string> = {
    config_json: toScriptJson(snapshot),
    icon_data_uri: escapeAttribute(iconDataUri)
  };

  return template.replace(PLACEHOLDER, (_match, key: string) => {
    const value = values[key];
    if (value === undefined) {
      throw new TemplateRenderError(`Unknown template placeholder "${key}"`);
    }
    return value;
  });
};
