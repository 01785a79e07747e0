export const stripAnsi = (str: string): string => {
  // ANSI escape codes start with `\x1b[` and end with a letter.
  return str.replace(/\u001b\[[0-9;]*[a-zA-Z]/g, '');
};

/**
 * Shortens `str` to at most `max` characters by replacing its middle with `…`.
 * Used for long paths where both the root and the file name matter.
 */
export const truncateMiddle = (str: string, max: number): string => {
  if (str.length <= max) return str;
  if (max <= 1) return '…'.slice(0, max);
  const keep = max - 1;
  const head = Math.ceil(keep / 2);
  const tail = keep - head;
  return str.slice(0, head) + '…' + (tail > 0 ? str.slice(str.length - tail) : '');
};

/** Escapes `str` for use as a literal inside a regular expression. */
export const escapeRegExp = (str: string): string => str.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

const pad2 = (n: number): string => String(n).padStart(2, '0');

/** `YYYY-MM-DD HH:mm` in local time. */
export const formatDateTime = (ms: number): string => {
  const d = new Date(ms);
  return `${d.getFullYear()}-${pad2(d.getMonth() + 1)}-${pad2(d.getDate())} ${pad2(d.getHours())}:${pad2(d.getMinutes())}`;
};
