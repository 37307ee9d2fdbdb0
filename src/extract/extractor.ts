/**
 * Infobox Extractor
 *
 * Runs the per-question pipeline: fetch page -> locate infobox -> clean ->
 * match field pattern. Each step fails before the next one runs. Nothing is
 * cached, so asking twice about the same subject fetches the page twice.
 */

import { loggers } from '../lib/logger.js';
import { cleanText, extractField, getFirstInfoboxText } from './infobox.js';
import type { InfoboxField } from './fields.js';

/** Resolves a free-text subject to the rendered HTML of its top search hit */
export interface PageSource {
  getPageHtml(subject: string): Promise<string>;
}

/** Answers one field about one subject */
export interface FieldExtractor {
  extract(subject: string, field: InfoboxField): Promise<string>;
}

export class InfoboxExtractor implements FieldExtractor {
  constructor(private readonly source: PageSource) {}

  /**
   * Fetch the subject's page and return its cleaned infobox text
   */
  async getInfoboxText(subject: string): Promise<string> {
    const html = await this.source.getPageHtml(subject);
    return cleanText(getFirstInfoboxText(html));
  }

  async extract(subject: string, field: InfoboxField): Promise<string> {
    const log = loggers.extract.withOperation('extract');
    log.debug('Extracting field', { subject, field });

    const text = await this.getInfoboxText(subject);
    const value = extractField(text, field);

    log.debug('Field extracted', { subject, field, value });
    return value;
  }
}
