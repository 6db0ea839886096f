import { PDFDocument, StandardFonts, type PDFFont, type PDFPage } from 'pdf-lib';

/** A ruled table: `columns` are the x positions of the vertical borders, left to right. */
export interface SampleTable {
  columns: number[];
  rows: string[][];
}

export interface SampleDocument {
  title: string;
  lines: string[];
  table?: SampleTable;
  footer?: string[];
}

// Every name, number and amount below is made up.
export const SAMPLE_DOCUMENTS = {
  'sample-paystub': {
    title: 'Acme Widgets Inc',
    lines: [
      'Earnings Statement',
      '',
      'Employee: Jane Doe',
      'Employee ID: E1001',
      'Pay Period: 01/01/2024 - 01/14/2024',
      'Pay Date: 01/19/2024',
      'Pay Frequency: Bi-weekly',
    ],
    table: {
      columns: [50, 230, 300, 370, 460, 545],
      rows: [
        ['Description', 'Hours', 'Rate', 'Current', 'YTD'],
        ['Regular Pay', '80.00', '56.25', '4,500.00', '4,500.00'],
        ['401k Employer Match', '', '', '200.00', '200.00'],
        ['Federal Income Tax', '', '', '540.00', '540.00'],
        ['Health Insurance', '', '', '120.00', '120.00'],
      ],
    },
    footer: ['Gross Pay 4,500.00 4,500.00', 'Net Pay 3,200.00 3,200.00'],
  },
  'sample-w2': {
    title: '2024 Form W-2 Wage and Tax Statement',
    lines: [
      'Employer: Example Manufacturing Corp',
      'Employer identification number (EIN): 12-3456789',
      'Employee: John Q Public',
      'Employee SSN: XXX-XX-1234',
      '',
      '1 Wages, tips, other compensation $85,000.00',
      '2 Federal income tax withheld $12,000.00',
      '3 Social security wages $90,000.00',
      '4 Social security tax withheld $5,580.00',
      '5 Medicare wages and tips $90,000.00',
      '6 Medicare tax withheld $1,305.00',
      '12a Code D $5,000.00',
    ],
  },
} satisfies Record<string, SampleDocument>;

export type SampleName = keyof typeof SAMPLE_DOCUMENTS;

const PAGE_SIZE: [number, number] = [612, 792]; // US Letter
const MARGIN_X = 50;
const FONT_SIZE = 11;
const TITLE_SIZE = 16;
const TABLE_FONT_SIZE = 10;
const ROW_HEIGHT = 18;

/** Draws the table with its top border at `top`; returns the y of the bottom border. */
function drawTable(page: PDFPage, font: PDFFont, table: SampleTable, top: number): number {
  const bottom = top - table.rows.length * ROW_HEIGHT;
  const left = table.columns[0] ?? MARGIN_X;
  const right = table.columns[table.columns.length - 1] ?? left;

  for (let i = 0; i <= table.rows.length; i++) {
    const y = top - i * ROW_HEIGHT;
    page.drawLine({ start: { x: left, y }, end: { x: right, y }, thickness: 1 });
  }
  for (const x of table.columns) {
    page.drawLine({ start: { x, y: top }, end: { x, y: bottom }, thickness: 1 });
  }

  table.rows.forEach((row, rowIndex) => {
    const y = top - (rowIndex + 1) * ROW_HEIGHT + 5;
    row.forEach((cell, columnIndex) => {
      const x = table.columns[columnIndex];
      if (cell.length === 0 || x === undefined) return;
      page.drawText(cell, { x: x + 4, y, font, size: TABLE_FONT_SIZE });
    });
  });

  return bottom;
}

export async function buildSamplePdf(sample: SampleDocument): Promise<Uint8Array> {
  const doc = await PDFDocument.create();
  const font = await doc.embedFont(StandardFonts.Helvetica);
  const boldFont = await doc.embedFont(StandardFonts.HelveticaBold);
  const page = doc.addPage(PAGE_SIZE);

  let y = 740;

  page.drawText(sample.title, { x: MARGIN_X, y, font: boldFont, size: TITLE_SIZE });
  y -= 30;

  page.drawLine({ start: { x: MARGIN_X, y }, end: { x: PAGE_SIZE[0] - MARGIN_X, y }, thickness: 1 });
  y -= 20;

  const drawLines = (lines: string[]) => {
    for (const line of lines) {
      if (y < 50) break;
      if (line === '') {
        y -= 10;
        continue;
      }
      page.drawText(line, { x: MARGIN_X, y, font, size: FONT_SIZE });
      y -= 16;
    }
  };

  drawLines(sample.lines);

  if (sample.table) {
    y = drawTable(page, font, sample.table, y) - 24;
  }

  drawLines(sample.footer ?? []);

  return doc.save();
}
