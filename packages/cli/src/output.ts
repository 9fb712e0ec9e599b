/**
 * Plain-text formatting for command output
 */

import type { RemovalOutcome } from '@pagewright/core';

/**
 * Left-aligned columns, two spaces apart; the last column is not padded
 */
export function formatTable(headers: string[], rows: string[][]): string[] {
  const widths = headers.map((header, column) =>
    Math.max(header.length, ...rows.map((row) => (row[column] ?? '').length))
  );
  const format = (cells: string[]) =>
    cells
      .map((cell, column) => (column === cells.length - 1 ? cell : cell.padEnd(widths[column] + 2)))
      .join('');
  return [format(headers), ...rows.map(format)];
}

/**
 * "about-us" -> "About Us"
 */
export function titleFromId(pageId: string): string {
  return pageId
    .split('-')
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

/**
 * One line describing what happened to a deleted page's object
 */
export function describeRemoval(outcome: RemovalOutcome): string {
  switch (outcome.status) {
    case 'deleted':
      return `Deleted ${outcome.key}`;
    case 'absent':
      return `${outcome.key} was not present`;
    case 'failed':
      return `Could not delete ${outcome.key}: ${outcome.reason}`;
  }
}

/**
 * Human-readable size, e.g. "1.5 KB"
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  return `${(bytes / 1024).toFixed(1)} KB`;
}
