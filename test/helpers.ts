/**
 * Test helpers and utilities
 */

import { vi, type Mock } from 'vitest';
import type { PageSource } from '../src/extract/extractor.js';

/**
 * Build page HTML with an infobox table holding the given label/value rows
 */
export function createInfoboxHtml(rows: Array<[string, string]>, options: { title?: string } = {}): string {
  const body = rows
    .map(([label, value]) => `<tr><th scope="row" class="infobox-label">${label}</th><td class="infobox-data">${value}</td></tr>`)
    .join('');
  const caption = options.title ? `<caption class="infobox-title">${options.title}</caption>` : '';
  return `<div class="mw-parser-output"><table class="infobox vcard">${caption}<tbody>${body}</tbody></table><p>Article body.</p></div>`;
}

/**
 * Page source that serves fixed HTML per subject and records every fetch
 */
export function createFakePageSource(pages: Record<string, string>): PageSource & {
  getPageHtml: Mock<(subject: string) => Promise<string>>;
} {
  return {
    getPageHtml: vi.fn(async (subject: string) => {
      const html = pages[subject];
      if (html === undefined) {
        throw new Error(`No page for ${subject}`);
      }
      return html;
    }),
  };
}

/**
 * Minimal Response stand-in for a stubbed fetch
 */
export function jsonResponse(body: unknown, init: { status?: number; statusText?: string } = {}): Response {
  return new Response(JSON.stringify(body), {
    status: init.status ?? 200,
    statusText: init.statusText ?? 'OK',
    headers: { 'Content-Type': 'application/json' },
  });
}
