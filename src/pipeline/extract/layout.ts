/** Tells whether a line already belongs to the first data row rather than the header. */
export type RowStartSentinel = (line: string) => boolean;

export const startsWithDigit: RowStartSentinel = (line) => /^\d/.test(line);

export function startsWithMarker(markers: readonly string[]): RowStartSentinel {
  return (line) => markers.some((marker) => line.startsWith(marker));
}

export interface RecapLayout {
  /** Both markers must appear on the title line. */
  titleMarker: string;
  datePrefix: string;
  /** Trimmed line that opens the column header. */
  headerStart: string;
  rowStartSentinels: readonly RowStartSentinel[];
  /** First cell of the row that closes every table, or null to read to the end. */
  terminalSymbol: string | null;
}

export const END_OF_DAY_RECAP_LAYOUT: RecapLayout = {
  titleMarker: 'End-of-Day Recap',
  datePrefix: 'Price quotes for',
  headerStart: 'Symbol',
  rowStartSentinels: [startsWithDigit, startsWithMarker(['^', '$', 'N'])],
  terminalSymbol: '^USDCHF',
};

export function isRowStart(line: string, layout: RecapLayout = END_OF_DAY_RECAP_LAYOUT): boolean {
  return layout.rowStartSentinels.some((sentinel) => sentinel(line));
}
