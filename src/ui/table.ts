import Table from 'cli-table3';

export function renderTable(head: string[], rows: string[][], color = true): string {
  const table = new Table({ head, style: { head: color ? ['cyan'] : [], border: color ? ['grey'] : [] } });
  table.push(...rows);
  return table.toString();
}

export function printTable(head: string[], rows: string[][]): void {
  console.log(renderTable(head, rows, process.stdout.isTTY === true));
}
