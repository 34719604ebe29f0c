import type { CountComparison } from './Counting';

const TITLE = 'Comparison results:';
const HEADER: readonly [string, string, string] = ['', 'Exact counting', 'HyperLogLog'];

type Row = readonly [string, string, string];

export function formatComparisonTable(comparison: CountComparison): string[] {
  const { exact, approximate } = comparison;
  const rows: Row[] = [
    ['Unique elements', exact.result.toFixed(1), approximate.result.toFixed(1)],
    ['Execution time (sec.)', exact.seconds.toFixed(4), approximate.seconds.toFixed(4)],
  ];

  const all: Row[] = [HEADER, ...rows];
  const width = (col: 0 | 1 | 2): number => Math.max(...all.map(row => row[col].length));
  const [left, exactWidth, approximateWidth] = [width(0), width(1), width(2)];

  const render = (row: Row): string => [
    row[0].padEnd(left),
    row[1].padStart(exactWidth),
    row[2].padStart(approximateWidth),
  ].join('  ');

  return [TITLE, ...all.map(render)];
}
