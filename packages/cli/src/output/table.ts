import Table from 'cli-table3';

/**
 * Renders rows as a plain-text table without ANSI styling. Cells follow the
 * key order of each row; `head` defaults to the first row's keys.
 */
export function formatTable(data: Record<string, unknown>[], options?: Table.TableConstructorOptions): string {
  const head = options?.head ?? Object.keys(data[0] ?? {});
  const table = new Table({ head, style: { head: [], border: [] }, ...options });
  data.forEach((row) => table.push(Object.values(row).map((v) => (v === undefined ? '' : String(v)))));
  return table.toString();
}
