/**
 * @tabq/cli Result Rendering
 *
 * Turns a core QueryResult into text for stdout. Numeric columns are
 * right-aligned, everything else left-aligned.
 */

import { isNumeric } from '@tabq/core';
import type { QueryResult } from '@tabq/core';
import type { RenderOptions } from './types.js';

interface Table {
  headers: readonly string[];
  rows: readonly (readonly string[])[];
}

interface Column {
  width: number;
  alignRight: boolean;
}

function toTable(result: QueryResult): Table {
  if (result.kind === 'aggregate') {
    return { headers: ['result'], rows: [[String(result.value.result)]] };
  }
  return {
    headers: result.headers,
    rows: result.records.map(record => result.headers.map(header => record[header] ?? '')),
  };
}

function measure(table: Table): Column[] {
  return table.headers.map((header, i) => {
    const cells = table.rows.map(row => row[i] ?? '');
    const filled = cells.filter(cell => cell.trim() !== '');
    return {
      width: cells.reduce((widest, cell) => Math.max(widest, cell.length), header.length),
      alignRight: filled.length > 0 && filled.every(cell => isNumeric(cell)),
    };
  });
}

function pad(text: string, column: Column): string {
  return column.alignRight ? text.padStart(column.width) : text.padEnd(column.width);
}

function renderGrid(table: Table, columns: readonly Column[]): string {
  const rule = (fill: string) => `+${columns.map(c => fill.repeat(c.width + 2)).join('+')}+`;
  const line = (cells: readonly string[]) =>
    `| ${columns.map((c, i) => pad(cells[i] ?? '', c)).join(' | ')} |`;

  return [
    rule('-'),
    line(table.headers),
    rule('='),
    ...table.rows.flatMap(row => [line(row), rule('-')]),
  ].join('\n');
}

function renderSimple(table: Table, columns: readonly Column[]): string {
  const line = (cells: readonly string[]) =>
    columns.map((c, i) => pad(cells[i] ?? '', c)).join('  ');

  return [
    line(table.headers),
    columns.map(c => '-'.repeat(c.width)).join('  '),
    ...table.rows.map(line),
  ].join('\n');
}

function renderJson(result: QueryResult): string {
  if (result.kind === 'aggregate') {
    return JSON.stringify({ result: result.value.result }, null, 2);
  }
  return JSON.stringify(result.records, null, 2);
}

/**
 * Render a result in the configured format. An empty records result
 * renders as `options.emptyMessage`. The returned text has no trailing
 * newline.
 *
 * @example
 * ```typescript
 * renderResult(aggregateOutcome({ result: 624 }), { format: 'grid', emptyMessage: '' });
 * // +--------+
 * // | result |
 * // +========+
 * // |    624 |
 * // +--------+
 * ```
 */
export function renderResult(result: QueryResult, options: RenderOptions): string {
  if (result.kind === 'records' && result.records.length === 0) {
    return options.emptyMessage;
  }

  if (options.format === 'json') {
    return renderJson(result);
  }

  const table = toTable(result);
  const columns = measure(table);
  return options.format === 'simple' ? renderSimple(table, columns) : renderGrid(table, columns);
}
