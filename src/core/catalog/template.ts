/**
 * Textual template filling for catalog entries
 *
 * Markers have the form {{name}}. Single-brace path parameters such as
 * {featureId} are literal text and never substituted.
 */

import { errors } from '../../utils/errors.js';

export type TemplateValues = Readonly<Record<string, string>>;

const MARKER_PATTERN = /\{\{\s*([A-Za-z][\w-]*)\s*\}\}/g;

/**
 * Replace every known {{marker}}; unknown markers are left in place
 */
export function fillTemplate(template: string, values: TemplateValues): string {
  return template.replace(MARKER_PATTERN, (marker, name: string) =>
    Object.prototype.hasOwnProperty.call(values, name) ? values[name] : marker
  );
}

export function fillAll(templates: readonly string[], values: TemplateValues): string[] {
  return templates.map(t => fillTemplate(t, values));
}

/**
 * List the markers still present in rendered text, in order of first appearance
 */
export function findPlaceholders(text: string): string[] {
  const found: string[] = [];
  for (const match of text.matchAll(MARKER_PATTERN)) {
    if (!found.includes(match[0])) {
      found.push(match[0]);
    }
  }
  return found;
}

/**
 * @param source - Where the text came from, named in the error
 */
export function assertNoPlaceholders(source: string, text: string): void {
  const markers = findPlaceholders(text);
  if (markers.length > 0) {
    throw errors.unresolvedPlaceholder(source, markers);
  }
}

/**
 * Fill a catalog template and reject any marker the values did not cover
 */
export function renderTemplate(source: string, template: string, values: TemplateValues): string {
  const text = fillTemplate(template, values);
  assertNoPlaceholders(source, text);
  return text;
}

export function renderAll(source: string, templates: readonly string[], values: TemplateValues): string[] {
  return templates.map(t => renderTemplate(source, t, values));
}
