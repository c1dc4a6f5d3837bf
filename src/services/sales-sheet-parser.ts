import { read, utils, type CellObject, type WorkBook, type WorkSheet } from 'xlsx';
import { MalformedHeaderError, MissingIdentityError } from '../errors.js';
import { cellNumber, cellText } from '../utils/numeric.js';

export type SheetLayout = {
  /** Zero-based index of the header row; the rows above it are report titles. */
  headerRow: number;
  sheetName?: string;
};

export const DEFAULT_SHEET_LAYOUT: SheetLayout = { headerRow: 4 };

// CustomerCode, Salesman, Total
const LEADING_COLUMNS = 3;
// item count
const TRAILING_COLUMNS = 1;

export type BrandColumn = {
  name: string;
  column: number;
};

export type SheetSchema = {
  headerRow: number;
  customerCodeColumn: number;
  salesmanColumn: number;
  totalColumn: number;
  brandColumns: BrandColumn[];
  countColumn: number;
  lastRow: number;
};

export type SalesRowRecord = {
  rowNumber: number;
  customerCode: string;
  salesman: string | null;
  total: number | null;
  itemCount: number | null;
  quantities: Map<string, number>;
};

export type ParsedRow =
  | { kind: 'record'; record: SalesRowRecord }
  | { kind: 'error'; error: MissingIdentityError };

export type SalesSheet = {
  schema: SheetSchema;
  rows(): Generator<ParsedRow, void, undefined>;
};

function cellValue(sheet: WorkSheet, row: number, column: number): unknown {
  const cell: CellObject | undefined = sheet[utils.encode_cell({ r: row, c: column })];
  // error cells (#N/A, #DIV/0!) carry their error code in `v`
  if (!cell || cell.t === 'e') return null;
  return cell.v ?? null;
}

function isBlank(value: unknown): boolean {
  return cellText(value) === null;
}

function displayRow(row: number): number {
  return row + 1;
}

export function resolveSheetSchema(sheet: WorkSheet, layout: SheetLayout): SheetSchema {
  const ref = sheet['!ref'];
  if (!ref) {
    throw new MalformedHeaderError('worksheet is empty', displayRow(layout.headerRow));
  }
  const range = utils.decode_range(ref);
  const { headerRow } = layout;
  if (headerRow > range.e.r) {
    throw new MalformedHeaderError(
      `header row ${displayRow(headerRow)} is beyond the last row of the sheet`,
      displayRow(headerRow)
    );
  }

  let width = 0;
  for (let column = range.e.c; column >= 0; column -= 1) {
    if (!isBlank(cellValue(sheet, headerRow, column))) {
      width = column + 1;
      break;
    }
  }

  if (width <= LEADING_COLUMNS + TRAILING_COLUMNS) {
    throw new MalformedHeaderError(
      `header row ${displayRow(headerRow)} has no brand columns`,
      displayRow(headerRow)
    );
  }

  const brandColumns: BrandColumn[] = [];
  const seen = new Set<string>();
  for (let column = LEADING_COLUMNS; column < width - TRAILING_COLUMNS; column += 1) {
    const name = cellText(cellValue(sheet, headerRow, column));
    const address = utils.encode_cell({ r: headerRow, c: column });
    if (name === null) {
      throw new MalformedHeaderError(`brand header at ${address} is blank`, displayRow(headerRow));
    }
    if (seen.has(name)) {
      throw new MalformedHeaderError(`brand "${name}" appears twice in the header`, displayRow(headerRow));
    }
    seen.add(name);
    brandColumns.push({ name, column });
  }

  return {
    headerRow,
    customerCodeColumn: 0,
    salesmanColumn: 1,
    totalColumn: 2,
    brandColumns,
    countColumn: width - 1,
    lastRow: range.e.r,
  };
}

function* extractRows(sheet: WorkSheet, schema: SheetSchema): Generator<ParsedRow, void, undefined> {
  for (let row = schema.headerRow + 1; row <= schema.lastRow; row += 1) {
    const values: unknown[] = [];
    for (let column = 0; column <= schema.countColumn; column += 1) {
      values.push(cellValue(sheet, row, column));
    }
    if (values.every(isBlank)) continue;

    const customerCode = cellText(values[schema.customerCodeColumn]);
    if (customerCode === null) {
      yield { kind: 'error', error: new MissingIdentityError(displayRow(row)) };
      continue;
    }

    const quantities = new Map<string, number>();
    for (const brand of schema.brandColumns) {
      quantities.set(brand.name, cellNumber(values[brand.column]) ?? 0);
    }

    const itemCount = cellNumber(values[schema.countColumn]);
    yield {
      kind: 'record',
      record: {
        rowNumber: displayRow(row),
        customerCode,
        salesman: cellText(values[schema.salesmanColumn]),
        total: cellNumber(values[schema.totalColumn]),
        itemCount: itemCount === null ? null : Math.trunc(itemCount),
        quantities,
      },
    };
  }
}

/**
 * Reads a monthly sales workbook and resolves its header eagerly, so layout
 * problems surface before any row is consumed. Rows are produced lazily and
 * only once.
 */
export function openSalesSheet(file: Buffer, layout: SheetLayout = DEFAULT_SHEET_LAYOUT): SalesSheet {
  let workbook: WorkBook;
  try {
    workbook = read(file, { type: 'buffer', cellDates: true });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new MalformedHeaderError(`file is not a readable workbook: ${message}`);
  }

  const sheetName = layout.sheetName ?? workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (!sheet) {
    throw new MalformedHeaderError(
      layout.sheetName ? `worksheet "${layout.sheetName}" not found` : 'workbook has no worksheets'
    );
  }

  return salesSheetFromWorksheet(sheet, layout);
}

export function salesSheetFromWorksheet(sheet: WorkSheet, layout: SheetLayout = DEFAULT_SHEET_LAYOUT): SalesSheet {
  const schema = resolveSheetSchema(sheet, layout);
  let consumed = false;

  return {
    schema,
    rows() {
      if (consumed) {
        throw new Error('sales sheet rows can only be read once');
      }
      consumed = true;
      return extractRows(sheet, schema);
    },
  };
}
