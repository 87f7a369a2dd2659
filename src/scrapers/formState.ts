/**
 * formState.ts — Form State Extractor.
 *
 * Turns the HTML of a postback page into the field map a browser would
 * submit: hidden view-state fields, text inputs, checked boxes and radios,
 * selected options.  Pure; nothing is synthesized, absent fields are simply
 * not in the map.
 *
 * cheerio's parser is forgiving, so truncated or malformed markup still
 * yields whatever fields it could recover instead of throwing.
 */

import * as cheerio from 'cheerio';

/** Inputs that are only submitted when clicked. */
const NON_SUBMITTED_INPUT_TYPES = new Set(['submit', 'button', 'image', 'reset', 'file']);

export type FieldMap = Record<string, string>;

export function extractFormState(html: string): FieldMap {
  if (typeof html !== 'string' || html.length === 0) return {};

  // Names such as "constructor" or "__proto__" must not hit Object.prototype.
  const fields = new Map<string, string>();
  const $ = cheerio.load(html);

  $('input, select, textarea').each((_, el) => {
    const $el = $(el);
    const name = $el.attr('name');
    // First occurrence wins; nameless controls are never submitted.
    if (!name || fields.has(name)) return;

    switch (el.tagName.toLowerCase()) {
      case 'input': {
        const type = ($el.attr('type') ?? 'text').trim().toLowerCase();
        if (NON_SUBMITTED_INPUT_TYPES.has(type)) return;

        if (type === 'checkbox' || type === 'radio') {
          if ($el.attr('checked') === undefined) return;
          fields.set(name, $el.attr('value') ?? 'on');
          return;
        }

        fields.set(name, $el.attr('value') ?? '');
        return;
      }

      case 'select': {
        const selected = $el.find('option[selected]').first();
        const option = selected.length > 0 ? selected : $el.find('option').first();
        fields.set(name, option.length > 0 ? (option.attr('value') ?? option.text()) : '');
        return;
      }

      case 'textarea':
        fields.set(name, $el.text());
        return;
    }
  });

  return Object.fromEntries(fields);
}

/** Names of every form control in `html`, submitted or not, in document order. */
export function listControlNames(html: string): string[] {
  if (typeof html !== 'string' || html.length === 0) return [];

  const $ = cheerio.load(html);
  const names = new Set<string>();
  $('input[name], select[name], textarea[name]').each((_, el) => {
    const name = $(el).attr('name');
    if (name) names.add(name);
  });
  return [...names];
}
