/**
 * exportFetcher.ts — Replays a tariff's XML export form over plain HTTP.
 *
 * The browser flow is: click the XML link → a popup opens → tick seven status
 * boxes → choose plain-text XML → click Export.  Underneath, that is one GET
 * (the form, with a fresh view-state) and one POST (the form with those
 * selections).  This module performs exactly those two requests:
 *
 *   1. GET   export URL                     → form HTML
 *   2.       extractFormState(form HTML)    → field map
 *   3.       applyExportSelections(fields)  → overlaid map
 *   4. POST  export URL, overlaid map       → XML bytes
 *
 * One call is one attempt.  Failures are thrown, never swallowed; the
 * Pipeline Driver owns the retry budget.
 */

import { ExportContentError, ExportHttpError } from '../core/errors';
import { Logger } from '../core/logger';
import type { ExportSource, HttpSession, TariffId } from '../core/types';
import { isAuthWallResponse } from '../middleware/compliance';
import {
  applyExportSelections,
  DEFAULT_EXPORT_FORM,
  type ExportFormSchema,
} from '../middleware/exportForm';
import { extractFormState, listControlNames } from '../scrapers';

const HTML_DOCUMENT = /^\s*(<!doctype\s+html|<html[\s>])/i;

export interface ExportFetcherOptions {
  /** Export endpoint with a `{{tid}}` placeholder. */
  exportUrlTemplate: string;
  formSchema?: ExportFormSchema;
  logger?: Logger;
}

export function buildExportUrl(template: string, id: TariffId): string {
  return template.replace(/\{\{tid\}\}/g, String(id));
}

export class ExportFetcher implements ExportSource {
  private readonly session: HttpSession;
  private readonly options: ExportFetcherOptions;
  private readonly logger: Logger;

  constructor(session: HttpSession, options: ExportFetcherOptions) {
    this.session = session;
    this.options = options;
    this.logger = options.logger ?? new Logger('ExportFetcher');
  }

  async fetch(id: TariffId): Promise<Buffer> {
    const url = buildExportUrl(this.options.exportUrlTemplate, id);

    // ── 1. Load the form ─────────────────────────────────
    const form = await this.session.get(url);
    if (!isSuccess(form.statusCode)) {
      this.warnIfAuthWall(form.statusCode, id);
      throw new ExportHttpError(form.statusCode, 'form', url);
    }

    // ── 2–3. Scrape and overlay ──────────────────────────
    const fields = extractFormState(form.text);
    const payload = applyExportSelections(
      fields,
      this.options.formSchema ?? DEFAULT_EXPORT_FORM,
      listControlNames(form.text),
    );
    this.logger.debug(
      `tid=${id}: posting ${Object.keys(payload).length} field(s) ` +
        `(${Object.keys(fields).length} scraped)`,
    );

    // ── 4. Submit ────────────────────────────────────────
    const exported = await this.session.post(url, payload);
    if (!isSuccess(exported.statusCode)) {
      this.warnIfAuthWall(exported.statusCode, id);
      throw new ExportHttpError(exported.statusCode, 'submit', url);
    }

    if (exported.body.length === 0) {
      throw new ExportContentError(`Export for tid=${id} returned an empty body`);
    }
    if (HTML_DOCUMENT.test(exported.text.slice(0, 512))) {
      throw new ExportContentError(
        `Export for tid=${id} returned an HTML page instead of an export document`,
      );
    }

    return exported.body;
  }

  private warnIfAuthWall(statusCode: number, id: TariffId): void {
    if (isAuthWallResponse(statusCode)) {
      this.logger.warn(`tid=${id}: HTTP ${statusCode}; the site session may have expired`);
    }
  }
}

function isSuccess(statusCode: number): boolean {
  return statusCode >= 200 && statusCode < 300;
}
