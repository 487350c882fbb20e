import { afterEach, describe, expect, it, vi } from 'vitest';
import type { RenderEvent } from './models/terminal';
import { CommandByte } from './protocol/constants';
import { TerminalSession, type TerminalSessionOptions } from './session';
import { FakeTransport } from './test-utils/fake-transport';

const ascii = (text: string): number[] => Array.from(text, (c) => c.charCodeAt(0));

/** `7E line C0 line ... 7E` */
function frame(...lines: string[]): number[] {
  const body = lines.flatMap((line, i) => (i === 0 ? ascii(line) : [0xc0, ...ascii(line)]));
  return [0x7e, ...body, 0x7e];
}

interface Harness {
  session: TerminalSession;
  transport: FakeTransport;
  renders: RenderEvent[];
  raw: string[];
  log: string[];
  highlights: boolean[];
  errors: Error[];
}

function createSession(options: TerminalSessionOptions = {}): Harness {
  const transport = new FakeTransport();
  const harness: Omit<Harness, 'session'> = {
    transport,
    renders: [],
    raw: [],
    log: [],
    highlights: [],
    errors: [],
  };
  const session = new TerminalSession(transport, {
    pollIntervalMs: 1,
    blinkIntervalMs: 60_000,
    timestamps: false,
    ...options,
    handlers: {
      render: (e) => harness.renders.push(e),
      raw: (line) => harness.raw.push(line),
      log: (line) => harness.log.push(line),
      highlight: (active) => harness.highlights.push(active),
      error: (error) => harness.errors.push(error),
    },
  });
  return { ...harness, session };
}

describe('TerminalSession', () => {
  let current: Harness | undefined;

  const start = (options: TerminalSessionOptions = {}): Harness => {
    current = createSession(options);
    current.session.start();
    return current;
  };

  afterEach(async () => {
    await current?.session.stop();
    current = undefined;
  });

  it('renders decoded frames from the transport', async () => {
    const { transport, renders } = start();

    transport.push(frame('MENU', '1.RUN'));

    await vi.waitFor(() => expect(renders.length).toBe(1));
    expect(renders[0].text).toBe('▶ MENU\n  1.RUN');
    expect(renders[0].lines).toEqual(['MENU', '1.RUN']);
  });

  it('logs raw chunks as hex', async () => {
    const { transport, raw } = start();

    transport.push([0x7e, 0x41, 0x7e]);

    await vi.waitFor(() => expect(raw).toEqual(['7E 41 7E']));
  });

  it('logs raw chunks as text when hex is off', async () => {
    const { transport, raw } = start({ hexLog: false });

    transport.push(ascii('OK'));

    await vi.waitFor(() => expect(raw).toEqual(['OK']));
  });

  it('moves the cursor and sends the command byte', async () => {
    const { session, transport, renders, log } = start();
    transport.push(frame('A', 'B', 'C'));
    await vi.waitFor(() => expect(renders.length).toBe(1));

    expect(await session.press('down')).toBe(0x01);

    expect(session.state.cursorIndex).toBe(1);
    expect(renders[1].text).toBe('  A\n▶ B\n  C');
    expect(transport.written.map((d) => Array.from(d))).toEqual([[0x01]]);
    expect(log).toEqual(['[TX] 01']);
  });

  it('sends nothing for up/down before the first frame', async () => {
    const { session, transport } = start();

    expect(await session.press('up')).toBeNull();
    expect(transport.written).toEqual([]);
  });

  it('sends ESC regardless of the display', async () => {
    const { session, transport, log } = start();

    expect(await session.press('escape')).toBe(0x04);
    expect(transport.written.map((d) => Array.from(d))).toEqual([[0x04]]);
    expect(log).toEqual(['[TX] 04']);
  });

  it('reports a failed write without touching the display', async () => {
    const { session, transport, renders, log } = start();
    transport.push(frame('A', 'B'));
    await vi.waitFor(() => expect(renders.length).toBe(1));
    transport.isOpen = false;

    expect(await session.sendCommand(CommandByte.UP)).toBe(false);

    expect(log).toEqual(['[TX ERROR] Port fake is not open']);
    expect(session.state).toEqual({ lines: ['A', 'B'], cursorIndex: 0, blinkVisible: true });
  });

  it('highlights the display for a while after ENT', async () => {
    const { session, transport, highlights } = start({ highlightMs: 20 });

    expect(await session.press('enter')).toBe(0x02);
    expect(session.isHighlighted).toBe(true);
    expect(transport.written.map((d) => Array.from(d))).toEqual([[0x02]]);

    await vi.waitFor(() => expect(highlights).toEqual([true, false]));
    expect(session.isHighlighted).toBe(false);
  });

  it('keeps the display when a frame carries only control bytes', async () => {
    const { transport, renders, raw } = start();
    transport.push(frame('A', 'B'));
    await vi.waitFor(() => expect(renders.length).toBe(1));

    transport.push([0x7e, 0xc0, 0x94, 0x7e]);
    await vi.waitFor(() => expect(raw.length).toBe(2));

    expect(renders.length).toBe(1);
    expect(current?.session.state.lines).toEqual(['A', 'B']);
  });

  it('carries the cursor index into the next frame modulo its length', async () => {
    const { session, transport, renders } = start();
    transport.push(frame('A', 'B', 'C'));
    await vi.waitFor(() => expect(renders.length).toBe(1));
    await session.press('up');
    expect(session.state.cursorIndex).toBe(2);

    transport.push(frame('X', 'Y'));
    await vi.waitFor(() => expect(renders.length).toBe(3));

    expect(session.state.cursorIndex).toBe(0);
    expect(renders[2].text).toBe('▶ X\n  Y');
  });

  it('blinks the cursor on the blink interval', async () => {
    const { transport, renders } = start({ blinkIntervalMs: 10 });
    transport.push(frame('A'));

    await vi.waitFor(() =>
      expect(renders.some((e) => !e.blinkVisible && e.text === '  A')).toBe(true)
    );
  });

  it('reports transport read failures', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const { transport, errors } = start();

    transport.readError = new Error('device unplugged');

    await vi.waitFor(() => expect(errors.map((e) => e.message)).toEqual(['device unplugged']));
    vi.restoreAllMocks();
  });

  it('stops once and closes the transport', async () => {
    const { session, transport } = start();

    await session.stop();
    await session.stop();

    expect(session.isRunning).toBe(false);
    expect(transport.closeCount).toBe(1);
  });

  it('stops reporting running once the pump ends on a read failure', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const { session, transport, errors } = start();
    expect(session.isRunning).toBe(true);

    transport.readError = new Error('device unplugged');

    await vi.waitFor(() => expect(errors.length).toBe(1));
    expect(session.isRunning).toBe(false);
    vi.restoreAllMocks();
  });
});

describe('TerminalSession handler failures', () => {
  const uiGone = (): never => {
    throw new Error('ui gone');
  };

  it('treats a throwing log handler as a handler error, not a write failure', async () => {
    const transport = new FakeTransport();
    const errors: string[] = [];
    const session = new TerminalSession(transport, {
      handlers: { log: uiGone, error: (error) => errors.push(error.message) },
    });

    expect(await session.sendCommand(CommandByte.ESC)).toBe(true);

    expect(transport.written.map((d) => Array.from(d))).toEqual([[0x04]]);
    expect(errors).toEqual(['ui gone']);
    await session.stop();
  });

  it('still sends ENT when the highlight handler throws', async () => {
    const transport = new FakeTransport();
    const errors: string[] = [];
    const session = new TerminalSession(transport, {
      highlightMs: 10,
      handlers: { highlight: uiGone, error: (error) => errors.push(error.message) },
    });

    expect(await session.press('enter')).toBe(0x02);
    expect(transport.written.map((d) => Array.from(d))).toEqual([[0x02]]);
    expect(errors).toEqual(['ui gone']);

    await vi.waitFor(() => expect(session.isHighlighted).toBe(false));
    expect(errors).toEqual(['ui gone', 'ui gone']);
    await session.stop();
  });
});

describe('TerminalSession timings', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('falls back to the default blink interval for a non-positive value', async () => {
    const setIntervalSpy = vi.spyOn(globalThis, 'setInterval');
    const session = new TerminalSession(new FakeTransport(), { blinkIntervalMs: 0 });

    session.start();

    expect(setIntervalSpy).toHaveBeenCalledWith(expect.any(Function), 500);
    await session.stop();
  });

  it('falls back to the default highlight time for NaN', async () => {
    const setTimeoutSpy = vi.spyOn(globalThis, 'setTimeout');
    const session = new TerminalSession(new FakeTransport(), { highlightMs: Number.NaN });

    await session.press('enter');

    expect(setTimeoutSpy).toHaveBeenCalledWith(expect.any(Function), 500);
    await session.stop();
  });
});
