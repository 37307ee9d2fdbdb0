/**
 * Tests for the ask and templates commands
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { askCommand } from '../../src/cli/ask.js';
import { templatesCommand } from '../../src/cli/templates.js';
import { replCommand } from '../../src/cli/repl.js';
import { QUERY_TEMPLATES } from '../../src/query/templates.js';
import { createInfoboxHtml, jsonResponse } from '../helpers.js';

describe('askCommand', () => {
  it('should have correct name and description', () => {
    expect(askCommand.name()).toBe('ask');
    expect(askCommand.description()).toBe('Answer a single question and exit');
  });

  it('should define the common options', () => {
    const flags = askCommand.options.map((o) => o.long);
    expect(flags).toEqual(['--lang', '--json', '--verbose']);
  });

  it('should take the question as variadic words', () => {
    const [arg] = askCommand.registeredArguments;
    expect(arg?.name()).toBe('query');
    expect(arg?.variadic).toBe(true);
    expect(arg?.required).toBe(true);
  });

  describe('action', () => {
    let logSpy: MockInstance<typeof console.log>;

    afterEach(() => {
      logSpy.mockRestore();
      vi.unstubAllGlobals();
    });

    it('should print the answers as JSON', async () => {
      logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
      const html = createInfoboxHtml([['Born', 'Jane Doe 1970-03-04 Testville']]);
      const mockFetch = vi
        .fn<typeof fetch>()
        .mockResolvedValueOnce(jsonResponse({ query: { search: [{ title: 'Testland' }] } }))
        .mockResolvedValueOnce(jsonResponse({ parse: { title: 'Testland', text: html } }));
      vi.stubGlobal('fetch', mockFetch);

      await askCommand.parseAsync(['When', 'was', 'the', 'president', 'of', 'Testland', 'born?', '--json'], {
        from: 'user',
      });

      expect(mockFetch).toHaveBeenCalledTimes(2);
      expect(logSpy).toHaveBeenCalledTimes(1);
      expect(logSpy).toHaveBeenCalledWith(
        JSON.stringify(
          { query: 'When was the president of Testland born?', answers: ['1970-03-04'] },
          null,
          2
        )
      );
    });
  });
});

describe('askCommand failures', () => {
  let exitSpy: MockInstance<typeof process.exit>;
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    vi.stubEnv('NO_COLOR', '1');
    exitSpy = vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`process.exit(${code})`);
    });
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    exitSpy.mockRestore();
    errorSpy.mockRestore();
    vi.unstubAllEnvs();
    vi.unstubAllGlobals();
  });

  const ask = (query: string) => askCommand.parseAsync(query.split(' '), { from: 'user' });

  it('should exit 1 when the search has no results', async () => {
    vi.stubGlobal('fetch', vi.fn<typeof fetch>().mockResolvedValueOnce(jsonResponse({ query: { search: [] } })));

    await expect(ask('who is the president of atlantis')).rejects.toThrow('process.exit(1)');

    expect(exitSpy).toHaveBeenCalledWith(1);
    expect(errorSpy).toHaveBeenCalledWith('\nError: No Wikipedia results for "atlantis"\n');
  });

  it('should exit 1 when the page has no infobox', async () => {
    vi.stubGlobal(
      'fetch',
      vi
        .fn<typeof fetch>()
        .mockResolvedValueOnce(jsonResponse({ query: { search: [{ title: 'Atlantis' }] } }))
        .mockResolvedValueOnce(jsonResponse({ parse: { title: 'Atlantis', text: '<p>A legend.</p>' } }))
    );

    await expect(ask('who is the president of atlantis')).rejects.toThrow('process.exit(1)');

    expect(errorSpy).toHaveBeenCalledWith('\nError: Page has no infobox\n');
  });

  it('should exit 3 when Wikipedia fails', async () => {
    vi.stubGlobal(
      'fetch',
      vi
        .fn<typeof fetch>()
        .mockResolvedValueOnce(jsonResponse({}, { status: 503, statusText: 'Service Unavailable' }))
    );

    await expect(ask('who is the president of testland')).rejects.toThrow('process.exit(3)');

    expect(exitSpy).toHaveBeenCalledWith(3);
    expect(errorSpy).toHaveBeenCalledWith('\nError: Wikipedia API error: 503 Service Unavailable\n');
  });

  it('should exit 2 on invalid configuration before any request', async () => {
    const mockFetch = vi.fn<typeof fetch>();
    vi.stubGlobal('fetch', mockFetch);
    vi.stubEnv('INFOBOT_TIMEOUT_MS', 'soon');

    await expect(ask('who is the president of testland')).rejects.toThrow('process.exit(2)');

    expect(exitSpy).toHaveBeenCalledWith(2);
    expect(errorSpy).toHaveBeenCalledWith(
      '\nError: Invalid configuration:\ntimeoutMs: Expected number, received nan\n'
    );
    expect(mockFetch).not.toHaveBeenCalled();
  });
});

describe('templatesCommand', () => {
  it('should have correct name', () => {
    expect(templatesCommand.name()).toBe('templates');
  });

  it('should print the templates as JSON', async () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    await templatesCommand.parseAsync(['--json'], { from: 'user' });

    expect(logSpy).toHaveBeenCalledWith(JSON.stringify(QUERY_TEMPLATES, null, 2));
    logSpy.mockRestore();
  });
});

describe('replCommand', () => {
  it('should have correct name and options', () => {
    expect(replCommand.name()).toBe('repl');
    expect(replCommand.options.map((o) => o.long)).toEqual(['--lang', '--verbose']);
  });
});
