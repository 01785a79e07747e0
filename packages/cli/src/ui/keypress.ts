import readline from 'node:readline';

export type KeyInput = NodeJS.ReadableStream & {
  isTTY?: boolean;
  isRaw?: boolean;
  setRawMode?: (mode: boolean) => unknown;
};

interface KeyInfo {
  name?: string;
  ctrl?: boolean;
}

/** `q`, Esc and Ctrl-C stop a running search. */
export function isCancelKey(key: KeyInfo | undefined): boolean {
  if (!key) return false;
  if (key.ctrl) return key.name === 'c';
  return key.name === 'q' || key.name === 'escape';
}

/**
 * Puts an interactive input into raw mode and calls `onCancel` on a cancel
 * key. Returns a function that restores the input. Non-TTY inputs are left
 * untouched.
 */
export function listenForCancel(input: KeyInput, onCancel: () => void): () => void {
  if (!input.isTTY || typeof input.setRawMode !== 'function') {
    return () => undefined;
  }
  const setRawMode = input.setRawMode.bind(input);
  const wasRaw = input.isRaw ?? false;

  readline.emitKeypressEvents(input);
  setRawMode(true);
  input.resume();

  const onKeypress = (_text: string | undefined, key: KeyInfo | undefined) => {
    if (isCancelKey(key)) onCancel();
  };
  input.on('keypress', onKeypress);

  return () => {
    input.off('keypress', onKeypress);
    setRawMode(wasRaw);
    input.pause();
  };
}
