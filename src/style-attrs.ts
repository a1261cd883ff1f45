/**
 * Presentation-attribute resolution.
 *
 * An element's style comes from two places: discrete attributes
 * (`fill="red"`) and the inline `style` property (`style="fill:red;"`).
 * Inline entries win over discrete attributes of the same name. When an
 * element sets a fill but no stroke, its outline is drawn in the fill colour.
 */

import type { StyleAttrs } from './types';

/** Discrete presentation attributes the reader collects from each element. */
export const PRESENTATION_ATTRIBUTES = [
  'fill',
  'stroke',
  'stroke-width',
  'fill-opacity',
  'stroke-opacity',
  'opacity',
  'fill-rule',
] as const;

/** Properties with a named field on `StyleAttrs`; the rest go to `extra`. */
const NAMED_PROPERTIES = new Set(['fill', 'stroke', 'stroke-width']);

/** Split `key:value;` entries. Entries without a colon are ignored. */
export function parseInlineStyle(style?: string | null): Record<string, string> {
  const entries: Record<string, string> = {};
  if (!style) return entries;
  for (const item of style.split(';')) {
    const colon = item.indexOf(':');
    if (colon < 0) continue;
    const key = item.slice(0, colon).trim();
    if (!key) continue;
    entries[key] = item.slice(colon + 1).trim();
  }
  return entries;
}

/**
 * Merge discrete attributes with the inline style (inline wins), then
 * default `stroke` to `fill`.
 */
export function mergeStyle(
  attributes: Readonly<Record<string, string>>,
  inlineStyle?: string | null
): StyleAttrs {
  const merged = new Map<string, string>([
    ...Object.entries(attributes),
    ...Object.entries(parseInlineStyle(inlineStyle)),
  ]);

  const extra: Record<string, string> = {};
  for (const [key, value] of merged) {
    if (!NAMED_PROPERTIES.has(key)) extra[key] = value;
  }

  const fill = merged.get('fill');
  return {
    fill,
    stroke: merged.get('stroke') ?? fill,
    strokeWidth: merged.get('stroke-width'),
    extra,
  };
}
