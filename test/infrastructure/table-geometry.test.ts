import { describe, it, expect } from 'vitest';
import {
  applyMatrix,
  buildGrid,
  clusterPositions,
  connectedRulings,
  fillGrid,
  multiply,
  rectangleRulings,
  streamTables,
  toRuling,
  type Ruling,
} from '../../src/infrastructure/pdf/table-geometry.js';
import type { PositionedText } from '../../src/infrastructure/pdf/types.js';

function text(value: string, x: number, y: number, width = 30): PositionedText {
  return { text: value, x, y, width, height: 10 };
}

function horizontal(position: number, start: number, end: number): Ruling {
  return { orientation: 'horizontal', position, start, end };
}

function vertical(position: number, start: number, end: number): Ruling {
  return { orientation: 'vertical', position, start, end };
}

describe('matrices', () => {
  it('composes a translation with a scale', () => {
    const matrix = multiply([1, 0, 0, 1, 10, 20], [2, 0, 0, 2, 0, 0]);
    expect(applyMatrix(matrix, 5, 5)).toEqual([20, 30]);
  });
});

describe('toRuling', () => {
  it('classifies a nearly flat segment as horizontal', () => {
    expect(toRuling(0, 100, 200, 100.5)).toEqual(horizontal(100.25, 0, 200));
  });

  it('classifies a vertical segment', () => {
    expect(toRuling(50, 300, 50, 100)).toEqual(vertical(50, 100, 300));
  });

  it('ignores diagonal and very short segments', () => {
    expect(toRuling(0, 0, 30, 30)).toBeNull();
    expect(toRuling(0, 0, 3, 0)).toBeNull();
  });
});

describe('rectangleRulings', () => {
  it('turns a box into its four edges', () => {
    const rulings = rectangleRulings([
      [0, 0],
      [100, 0],
      [0, 50],
      [100, 50],
    ]);
    expect(rulings).toEqual([
      horizontal(0, 0, 100),
      horizontal(50, 0, 100),
      vertical(0, 0, 50),
      vertical(100, 0, 50),
    ]);
  });

  it('turns a thin rectangle into one line', () => {
    const rulings = rectangleRulings([
      [0, 0],
      [100, 0],
      [0, 1],
      [100, 1],
    ]);
    expect(rulings).toEqual([horizontal(0.5, 0, 100)]);
  });
});

describe('clusterPositions', () => {
  it('averages positions within the tolerance', () => {
    expect(clusterPositions([100, 50, 51, 102], 3)).toEqual([50.5, 101]);
  });
});

describe('lattice grid', () => {
  const grid = [
    horizontal(100, 0, 200),
    horizontal(80, 0, 200),
    horizontal(60, 0, 200),
    vertical(0, 60, 100),
    vertical(100, 60, 100),
    vertical(200, 60, 100),
  ];

  it('groups touching rulings apart from a separate line', () => {
    const groups = connectedRulings([...grid, horizontal(500, 0, 200)]);
    expect(groups).toHaveLength(2);
    expect(groups.map((group) => group.length).sort()).toEqual([1, 6]);
  });

  it('builds column and row boundaries', () => {
    expect(buildGrid(grid)).toEqual({ columns: [0, 100, 200], rows: [100, 80, 60] });
  });

  it('needs at least two boundaries each way', () => {
    expect(buildGrid([horizontal(100, 0, 200), vertical(0, 60, 100)])).toBeNull();
  });

  it('places text in the cell holding its centre', () => {
    const boundaries = { columns: [0, 100, 200], rows: [100, 80, 60] };
    const filled = fillGrid(boundaries, [
      text('Gross', 5, 85),
      text('4,500.00', 105, 85, 40),
      text('Net', 5, 65),
      text('outside', 300, 85),
    ]);
    expect(filled).toEqual({
      rows: [
        ['Gross', '4,500.00'],
        ['Net', ''],
      ],
      quality: 75,
    });
  });

  it('returns null for an empty grid', () => {
    expect(fillGrid({ columns: [0, 100], rows: [100, 80] }, [])).toBeNull();
  });
});

describe('streamTables', () => {
  it('aligns whitespace-separated columns across lines', () => {
    const tables = streamTables([
      [text('Regular Pay', 50, 700, 50), text('4,500.00', 300, 700, 40)],
      [text('Overtime', 50, 684, 40), text('300.00', 305, 684)],
      [text('Thank you', 50, 668, 45)],
    ]);
    expect(tables).toEqual([
      {
        rows: [
          ['Regular Pay', '4,500.00'],
          ['Overtime', '300.00'],
        ],
        quality: 100,
      },
    ]);
  });

  it('ignores single rows', () => {
    expect(streamTables([[text('Gross', 50, 700), text('4,500.00', 300, 700)]])).toEqual([]);
  });
});
