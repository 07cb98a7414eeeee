function escapeCell(cell: string): string {
  if (/[",\r\n]/.test(cell)) {
    return `"${cell.replace(/"/g, '""')}"`;
  }
  return cell;
}

export function toCsv(header: string[], rows: string[][]): string {
  return [header, ...rows].map(row => row.map(escapeCell).join(',')).join('\r\n') + '\r\n';
}
