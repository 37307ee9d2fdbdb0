/**
 * Tests for the interactive question loop
 */

import { describe, it, expect, vi } from 'vitest';
import { PassThrough, Readable, Writable } from 'node:stream';
import { runRepl } from '../../src/cli/repl.js';
import { QueryDispatcher } from '../../src/query/dispatcher.js';
import { buildPatternActions, describeTemplates } from '../../src/query/templates.js';
import { FieldNotFoundError } from '../../src/lib/errors.js';
import type { FieldExtractor } from '../../src/extract/extractor.js';

function createIO(lines: string) {
  const chunks: string[] = [];
  const output = new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(String(chunk));
      callback();
    },
  });
  return {
    io: { input: Readable.from(Buffer.from(lines)), output },
    text: () => chunks.join(''),
  };
}

/** Keyboard-like input: readline treats it as a terminal and reads Ctrl-C as a keypress */
class TerminalInput extends PassThrough {
  readonly isTTY = true;

  setRawMode(_mode: boolean): this {
    return this;
  }
}

function createTerminalIO() {
  const chunks: string[] = [];
  const output = Object.assign(
    new Writable({
      write(chunk, _encoding, callback) {
        chunks.push(String(chunk));
        callback();
      },
    }),
    { isTTY: true }
  );
  const input = new TerminalInput();
  return { io: { input, output }, input, text: () => chunks.join('') };
}

const nextTurn = () => new Promise<void>((resolve) => setImmediate(resolve));

function createDispatcher(extract: FieldExtractor['extract']): QueryDispatcher {
  return new QueryDispatcher(buildPatternActions({ extract }));
}

const WELCOME = 'Welcome to the President Info Bot!\n\n';
const GOODBYE = '\nGoodbye!\n\n';

describe('runRepl', () => {
  it('should answer each line until end of input', async () => {
    const extract = vi.fn(async () => 'Jane Doe');
    const { io, text } = createIO('Who is the president of Testland?\nhello there\n');

    await runRepl(createDispatcher(extract), io);

    expect(text()).toBe(
      WELCOME +
        '\nYour query? Jane Doe\n' +
        "\nYour query? I don't understand\n" +
        '\nYour query? ' +
        GOODBYE
    );
    expect(extract).toHaveBeenCalledWith('testland', 'name');
  });

  it('should stop at quit without reading further lines', async () => {
    const extract = vi.fn(async () => 'Jane Doe');
    const { io, text } = createIO('quit\nwho is the president of testland\n');

    await runRepl(createDispatcher(extract), io);

    expect(text()).toBe(WELCOME + '\nYour query? ' + GOODBYE);
    expect(extract).not.toHaveBeenCalled();
  });

  it('should report a failed query and keep going', async () => {
    const extract = vi
      .fn<FieldExtractor['extract']>()
      .mockRejectedValueOnce(new FieldNotFoundError('successor', 'Page infobox has no successor information'))
      .mockResolvedValueOnce('1970-03-04');
    const { io, text } = createIO(
      'who is the successor of the president of testland\nwhen was the president of testland born\n'
    );

    await runRepl(createDispatcher(extract), io);

    expect(text()).toBe(
      WELCOME +
        '\nYour query? Error: Page infobox has no successor information\n' +
        '\nYour query? 1970-03-04\n' +
        '\nYour query? ' +
        GOODBYE
    );
  });

  it('should list the recognized questions on help', async () => {
    const { io, text } = createIO('help\n');

    await runRepl(createDispatcher(vi.fn(async () => '')), io);

    expect(text()).toBe(
      WELCOME + '\nYour query? ' + describeTemplates().join('\n') + '\n' + '\nYour query? ' + GOODBYE
    );
  });

  it('should say goodbye on empty input', async () => {
    const { io, text } = createIO('');

    await runRepl(createDispatcher(vi.fn(async () => '')), io);

    expect(text()).toBe(WELCOME + '\nYour query? ' + GOODBYE);
  });

  describe('interrupt', () => {
    it('should say goodbye on Ctrl-C at the prompt', async () => {
      const extract = vi.fn(async () => 'Jane Doe');
      const { io, input, text } = createTerminalIO();

      const session = runRepl(createDispatcher(extract), io);
      await nextTurn();
      input.write('\x03');
      await session;

      expect(text().startsWith(WELCOME)).toBe(true);
      expect(text().endsWith(GOODBYE)).toBe(true);
      expect(text().split('Goodbye!')).toHaveLength(2);
      expect(extract).not.toHaveBeenCalled();
    });

    it('should drop the reply of a query interrupted while pending', async () => {
      let finish: (answer: string) => void = () => {};
      const extract = vi.fn(
        () =>
          new Promise<string>((resolve) => {
            finish = resolve;
          })
      );
      const { io, input, text } = createTerminalIO();

      const session = runRepl(createDispatcher(extract), io);
      await nextTurn();
      input.write('who is the president of chile\r');
      await vi.waitFor(() => expect(extract).toHaveBeenCalledWith('chile', 'name'));

      input.write('\x03');
      await nextTurn();
      finish('Jane Doe');
      await session;

      const output = text();
      expect(output).not.toContain('Jane Doe');
      expect(output.slice(output.lastIndexOf('chile'))).toBe('chile\r\n' + GOODBYE);
    });
  });
});
