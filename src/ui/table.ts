import chalk from 'chalk';

export interface TableColumn<Row> {
  header: string;
  value: (row: Row) => string;
  align?: 'left' | 'right';
}

const ANSI_PATTERN = /\x1b\[[0-9;]*m/g;

const visibleLength = (str: string): number => str.replace(ANSI_PATTERN, '').length;

const padString = (str: string, width: number, align: 'left' | 'right' = 'left'): string => {
  const padding = Math.max(0, width - visibleLength(str));
  return align === 'right' ? ' '.repeat(padding) + str : str + ' '.repeat(padding);
};

export const createTable = <Row>(rows: Row[], columns: TableColumn<Row>[], padding = 2): string => {
  const cells = rows.map((row) => columns.map((col) => col.value(row)));
  const widths = columns.map((col, i) =>
    cells.reduce((max, rowCells) => Math.max(max, visibleLength(rowCells[i])), col.header.length)
  );
  const pad = ' '.repeat(padding);

  const lines: string[] = [
    columns.map((col, i) => chalk.bold(padString(col.header, widths[i], col.align))).join(pad),
    chalk.dim(widths.map((w) => '─'.repeat(w)).join(pad)),
  ];

  for (const rowCells of cells) {
    lines.push(
      columns.map((col, i) => padString(rowCells[i], widths[i], col.align)).join(pad).trimEnd()
    );
  }

  return lines.join('\n');
};
