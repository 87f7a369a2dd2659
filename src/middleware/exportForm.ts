/**
 * exportForm.ts — Deterministic overlay of the export selections.
 *
 * The export dialog on the tariff page is a popup with seven status
 * checkboxes, a format choice and an "Export" button that fires a postback.
 * Instead of clicking through it, the fetcher takes the field map scraped
 * from the form and overlays exactly the values that dialog would submit:
 *
 *   • every status checkbox → selected
 *   • plain-text format     → selected, binary format → not submitted
 *   • __EVENTTARGET         → the export action
 *   • __EVENTARGUMENT       → ""
 *
 * Nothing else is touched; anti-forgery and tracking fields pass through
 * exactly as scraped.
 */

import type { FieldMap } from '../scrapers/formState';

export const STATUS_CATEGORIES = [
  'effective',
  'accepted',
  'suspended',
  'pending',
  'conditionallyAccepted',
  'conditionallyEffective',
  'tolled',
] as const;

export type StatusCategory = (typeof STATUS_CATEGORIES)[number];

export interface ExportFormSchema {
  /** Short control name per status checkbox. */
  statusFields: Record<StatusCategory, string>;
  plainTextField: string;
  binaryField: string;
  /** Value a checked box submits. */
  selectedValue: string;
  eventTargetField: string;
  eventArgumentField: string;
  /** Control id the export postback targets. */
  exportAction: string;
}

export const DEFAULT_EXPORT_FORM: ExportFormSchema = {
  statusFields: {
    effective: 'chkEffective',
    accepted: 'chkAccepted',
    suspended: 'chkSuspended',
    pending: 'chkPending',
    conditionallyAccepted: 'chkConditionallyAccepted',
    conditionallyEffective: 'chkConditionallyEffective',
    tolled: 'chkTolled',
  },
  plainTextField: 'rbPlainTextXml',
  binaryField: 'rbBinaryXml',
  selectedValue: 'on',
  eventTargetField: '__EVENTTARGET',
  eventArgumentField: '__EVENTARGUMENT',
  exportAction: 'btnExportXml',
};

/**
 * Map a short control name onto the full name the form uses for it.
 *
 * WebForms prefixes control names with their naming container
 * (`ctl00$Main$chkEffective`), so a name matches when it equals the short
 * name or ends with `$name` / `:name`.  Unmatched names are used verbatim.
 */
export function resolveFieldName(controlNames: readonly string[], shortName: string): string {
  if (controlNames.includes(shortName)) return shortName;

  const match = controlNames.find(
    (name) => name.endsWith(`$${shortName}`) || name.endsWith(`:${shortName}`),
  );
  return match ?? shortName;
}

/**
 * Overlay the export selections onto `fields`.
 *
 * `controlNames` should list every control on the form, including unchecked
 * boxes that are absent from `fields`; it defaults to the keys of `fields`.
 */
export function applyExportSelections(
  fields: FieldMap,
  schema: ExportFormSchema = DEFAULT_EXPORT_FORM,
  controlNames: readonly string[] = Object.keys(fields),
): FieldMap {
  const overlaid: FieldMap = { ...fields };
  const resolve = (shortName: string): string => resolveFieldName(controlNames, shortName);

  for (const category of STATUS_CATEGORIES) {
    overlaid[resolve(schema.statusFields[category])] = schema.selectedValue;
  }

  overlaid[resolve(schema.plainTextField)] = schema.selectedValue;
  delete overlaid[resolve(schema.binaryField)];

  overlaid[schema.eventTargetField] = schema.exportAction;
  overlaid[schema.eventArgumentField] = '';

  return overlaid;
}
