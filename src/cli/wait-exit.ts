/**
 * "Press a key to exit" support for double-click launches, where the console
 * window would otherwise close before the report can be read.
 */

import { createInterface } from 'node:readline';

export interface WaitDecisionInput {
  /** true for --wait-exit, false for --no-wait-exit, undefined when neither */
  waitExit: boolean | undefined;
  platform: NodeJS.Platform;
  packaged: boolean;
  /** User arguments after the executable and script */
  argCount: number;
  isTTY: boolean;
}

export function shouldWaitBeforeExit(input: WaitDecisionInput): boolean {
  if (input.waitExit !== undefined) {
    return input.waitExit;
  }
  return input.platform === 'win32' && input.packaged && input.argCount === 0 && input.isTTY;
}

/** Set by pkg-style bundlers on the packaged executable's process object */
export function isPackagedExecutable(): boolean {
  return Reflect.has(process, 'pkg');
}

/** process.stdin satisfies this; raw mode is only touched on a terminal */
export interface KeyInput extends NodeJS.ReadableStream {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
}

export interface WaitStreams {
  input?: KeyInput;
  output?: NodeJS.WritableStream;
}

function setRawMode(input: KeyInput, mode: boolean): void {
  if (input.isTTY === true && input.setRawMode) {
    input.setRawMode(mode);
  }
}

function waitForKeyPress(input: KeyInput, output: NodeJS.WritableStream): Promise<void> {
  output.write('\nPress any key to exit...');
  return new Promise(resolve => {
    const done = (): void => {
      input.off('data', done);
      input.off('end', done);
      setRawMode(input, false);
      input.pause();
      output.write('\n');
      resolve();
    };
    setRawMode(input, true);
    input.once('data', done);
    input.once('end', done);
    input.resume();
  });
}

function waitForEnter(input: NodeJS.ReadableStream, output: NodeJS.WritableStream): Promise<void> {
  const rl = createInterface({ input, output });
  return new Promise(resolve => {
    rl.once('close', () => resolve());
    rl.once('SIGINT', () => rl.close());
    rl.question('\nPress Enter to exit...', () => rl.close());
  });
}

/**
 * Blocks until a key (Windows, prompt on stderr) or Enter (elsewhere, prompt
 * on stdout). End of input or an interrupt also ends the wait.
 */
export function waitBeforeExit(platform: NodeJS.Platform = process.platform, streams: WaitStreams = {}): Promise<void> {
  const input = streams.input ?? process.stdin;
  if (platform === 'win32') {
    return waitForKeyPress(input, streams.output ?? process.stderr);
  }
  return waitForEnter(input, streams.output ?? process.stdout);
}
