import Table from 'cli-table3';

export function formatTable(head: string[], rows: Array<Array<string | number>>): string {
  const table = new Table({ head });
  rows.forEach((row) => table.push(row.map((v) => String(v))));
  return table.toString();
}
