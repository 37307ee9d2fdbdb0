/**
 * Infobox text helpers
 *
 * Locate the first infobox in rendered page HTML, reduce it to clean ASCII
 * text, and pull single fields out of that text.
 */

import * as cheerio from 'cheerio';
import { FieldNotFoundError, MissingInfoboxError } from '../lib/errors.js';
import { FIELD_PATTERNS, type InfoboxField } from './fields.js';

/** Anything outside printable ASCII and the ASCII whitespace controls */
const NON_PRINTABLE = /[^\x20-\x7e\t\n\r\x0b\x0c]/gu;

/**
 * Get the text of the first element classed `infobox`
 *
 * Embedded `<style>` and `<script>` contents are not part of the text.
 *
 * @throws {MissingInfoboxError} If the page has no infobox
 */
export function getFirstInfoboxText(html: string): string {
  const $ = cheerio.load(html);
  const infobox = $('.infobox').first();

  if (infobox.length === 0) {
    throw new MissingInfoboxError('Page has no infobox');
  }

  infobox.find('style, script').remove();
  return infobox.text();
}

/**
 * Replace non-printable characters with spaces, then collapse runs of
 * spaces and runs of newlines
 */
export function cleanText(text: string): string {
  return text.replace(NON_PRINTABLE, ' ').replace(/ +/g, ' ').replace(/\n+/g, '\n');
}

/**
 * Apply a field's pattern to cleaned infobox text
 *
 * @returns The captured text, unmodified
 * @throws {FieldNotFoundError} If the pattern does not match
 */
export function extractField(text: string, field: InfoboxField): string {
  const { pattern, group, errorText } = FIELD_PATTERNS[field];
  const found = pattern.exec(text);
  const value = typeof group === 'number' ? found?.[group] : found?.groups?.[group];

  if (value === undefined) {
    throw new FieldNotFoundError(field, errorText);
  }
  return value;
}
