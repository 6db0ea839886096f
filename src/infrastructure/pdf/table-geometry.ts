import type { PositionedText } from './types.js';

export type Matrix = [number, number, number, number, number, number];

export const IDENTITY: Matrix = [1, 0, 0, 1, 0, 0];

/** Axis-aligned ruling line in PDF user space. */
export interface Ruling {
  orientation: 'horizontal' | 'vertical';
  /** y for horizontal rulings, x for vertical ones. */
  position: number;
  start: number;
  end: number;
}

export interface Grid {
  columns: number[];
  rows: number[];
}

const ALIGN_TOLERANCE = 1.5;
const MIN_RULING_LENGTH = 5;
const JOIN_TOLERANCE = 3;
const THIN_RECT = 2;

export function multiply(m: Matrix, n: Matrix): Matrix {
  return [
    m[0] * n[0] + m[2] * n[1],
    m[1] * n[0] + m[3] * n[1],
    m[0] * n[2] + m[2] * n[3],
    m[1] * n[2] + m[3] * n[3],
    m[0] * n[4] + m[2] * n[5] + m[4],
    m[1] * n[4] + m[3] * n[5] + m[5],
  ];
}

export function applyMatrix(m: Matrix, x: number, y: number): [number, number] {
  return [m[0] * x + m[2] * y + m[4], m[1] * x + m[3] * y + m[5]];
}

/** Classifies a segment as a ruling, or null when it is diagonal or too short. */
export function toRuling(x1: number, y1: number, x2: number, y2: number): Ruling | null {
  if (Math.abs(y1 - y2) <= ALIGN_TOLERANCE && Math.abs(x1 - x2) >= MIN_RULING_LENGTH) {
    return {
      orientation: 'horizontal',
      position: (y1 + y2) / 2,
      start: Math.min(x1, x2),
      end: Math.max(x1, x2),
    };
  }
  if (Math.abs(x1 - x2) <= ALIGN_TOLERANCE && Math.abs(y1 - y2) >= MIN_RULING_LENGTH) {
    return {
      orientation: 'vertical',
      position: (x1 + x2) / 2,
      start: Math.min(y1, y2),
      end: Math.max(y1, y2),
    };
  }
  return null;
}

/** Rulings drawn by a rectangle: a thin one is a single line, a box gives four edges. */
export function rectangleRulings(corners: Array<[number, number]>): Ruling[] {
  const xs = corners.map(([x]) => x);
  const ys = corners.map(([, y]) => y);
  const left = Math.min(...xs);
  const right = Math.max(...xs);
  const bottom = Math.min(...ys);
  const top = Math.max(...ys);

  if (top - bottom <= THIN_RECT) {
    const ruling = toRuling(left, (top + bottom) / 2, right, (top + bottom) / 2);
    return ruling ? [ruling] : [];
  }
  if (right - left <= THIN_RECT) {
    const ruling = toRuling((left + right) / 2, bottom, (left + right) / 2, top);
    return ruling ? [ruling] : [];
  }

  return [
    toRuling(left, bottom, right, bottom),
    toRuling(left, top, right, top),
    toRuling(left, bottom, left, top),
    toRuling(right, bottom, right, top),
  ].filter((r): r is Ruling => r !== null);
}

function touches(a: Ruling, b: Ruling): boolean {
  if (a.orientation === b.orientation) {
    return (
      Math.abs(a.position - b.position) <= JOIN_TOLERANCE &&
      a.start <= b.end + JOIN_TOLERANCE &&
      b.start <= a.end + JOIN_TOLERANCE
    );
  }
  const [h, v] = a.orientation === 'horizontal' ? [a, b] : [b, a];
  return (
    v.position >= h.start - JOIN_TOLERANCE &&
    v.position <= h.end + JOIN_TOLERANCE &&
    h.position >= v.start - JOIN_TOLERANCE &&
    h.position <= v.end + JOIN_TOLERANCE
  );
}

/** Splits rulings into groups of mutually connected lines; each group is a table candidate. */
export function connectedRulings(rulings: Ruling[]): Ruling[][] {
  const groupOf = rulings.map((_, i) => i);
  const find = (i: number): number => {
    while (groupOf[i] !== i) {
      groupOf[i] = groupOf[groupOf[i]];
      i = groupOf[i];
    }
    return i;
  };

  for (let i = 0; i < rulings.length; i++) {
    for (let j = i + 1; j < rulings.length; j++) {
      if (touches(rulings[i], rulings[j])) {
        groupOf[find(i)] = find(j);
      }
    }
  }

  const groups = new Map<number, Ruling[]>();
  rulings.forEach((ruling, i) => {
    const root = find(i);
    groups.set(root, [...(groups.get(root) ?? []), ruling]);
  });
  return [...groups.values()];
}

export function clusterPositions(values: number[], tolerance = JOIN_TOLERANCE): number[] {
  const sorted = [...values].sort((a, b) => a - b);
  const clusters: number[][] = [];
  for (const value of sorted) {
    const last = clusters[clusters.length - 1];
    if (last && value - last[last.length - 1] <= tolerance) {
      last.push(value);
    } else {
      clusters.push([value]);
    }
  }
  return clusters.map((c) => c.reduce((sum, v) => sum + v, 0) / c.length);
}

/** Column boundaries ascending (left to right), row boundaries descending (top to bottom). */
export function buildGrid(rulings: Ruling[]): Grid | null {
  const columns = clusterPositions(
    rulings.filter((r) => r.orientation === 'vertical').map((r) => r.position),
  );
  const rows = clusterPositions(
    rulings.filter((r) => r.orientation === 'horizontal').map((r) => r.position),
  ).reverse();

  if (columns.length < 2 || rows.length < 2) return null;
  return { columns, rows };
}

function cellIndex(boundaries: number[], value: number, descending: boolean): number {
  for (let i = 0; i < boundaries.length - 1; i++) {
    const [a, b] = [boundaries[i], boundaries[i + 1]];
    const inside = descending ? value <= a && value > b : value >= a && value < b;
    if (inside) return i;
  }
  return -1;
}

function joinCell(items: PositionedText[]): string {
  return [...items]
    .sort((a, b) => b.y - a.y || a.x - b.x)
    .map((item) => item.text.trim())
    .join(' ');
}

function fillRate(rows: string[][]): number {
  const cells = rows.flat();
  if (cells.length === 0) return 0;
  const filled = cells.filter((c) => c.length > 0).length;
  return Math.round((filled / cells.length) * 10000) / 100;
}

/**
 * Places each text run in the grid cell containing its centre. Rows that end
 * up empty are dropped; a grid that holds no text at all yields null.
 */
export function fillGrid(
  grid: Grid,
  items: PositionedText[],
): { rows: string[][]; quality: number } | null {
  const cells: PositionedText[][][] = grid.rows.slice(1).map(() =>
    grid.columns.slice(1).map(() => []),
  );

  for (const item of items) {
    const cx = item.x + item.width / 2;
    const cy = item.y + item.height / 2;
    const row = cellIndex(grid.rows, cy, true);
    const col = cellIndex(grid.columns, cx, false);
    if (row >= 0 && col >= 0) {
      cells[row][col].push(item);
    }
  }

  const rows = cells
    .map((row) => row.map(joinCell))
    .filter((row) => row.some((cell) => cell.length > 0));

  if (rows.length === 0) return null;
  return { rows, quality: fillRate(rows) };
}

/**
 * Whitespace-delimited tables: consecutive lines that split into at least
 * two cells at gaps wider than the font size. Column anchors are shared
 * across the block so cells line up.
 */
export function streamTables(
  lines: PositionedText[][],
  minRows = 2,
): Array<{ rows: string[][]; quality: number }> {
  const tables: Array<{ rows: string[][]; quality: number }> = [];
  let block: PositionedText[][][] = [];

  const flush = () => {
    if (block.length >= minRows) {
      tables.push(alignBlock(block));
    }
    block = [];
  };

  for (const line of lines) {
    const cells = splitOnGaps(line);
    if (cells.length >= 2) {
      block.push(cells);
    } else {
      flush();
    }
  }
  flush();

  return tables;
}

function splitOnGaps(line: PositionedText[]): PositionedText[][] {
  const cells: PositionedText[][] = [];
  let previous: PositionedText | undefined;

  for (const item of line) {
    const gap = previous ? item.x - (previous.x + previous.width) : Infinity;
    const threshold = Math.max(6, previous?.height ?? 0);
    if (gap > threshold || cells.length === 0) {
      cells.push([item]);
    } else {
      cells[cells.length - 1].push(item);
    }
    previous = item;
  }
  return cells;
}

function alignBlock(block: PositionedText[][][]): { rows: string[][]; quality: number } {
  const anchors = clusterPositions(
    block.flatMap((cells) => cells.map((cell) => cell[0].x)),
    12,
  );

  const rows = block.map((cells) => {
    const row = anchors.map(() => '');
    for (const cell of cells) {
      const x = cell[0].x;
      let column = 0;
      anchors.forEach((anchor, i) => {
        if (Math.abs(anchor - x) < Math.abs(anchors[column] - x)) column = i;
      });
      const text = cell.map((item) => item.text.trim()).join(' ');
      row[column] = row[column] ? `${row[column]} ${text}` : text;
    }
    return row;
  });

  return { rows, quality: fillRate(rows) };
}
