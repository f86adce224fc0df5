import fs from 'fs/promises';
import path from 'path';
import ExcelJS, { type Worksheet } from 'exceljs';
import { IoError, ValidationError, describeError } from './errors.js';
import { ProductRow, REQUIRED_COLUMNS, TEMPLATE_COLUMNS, TemplateColumn } from './types.js';

export interface SheetReadResult {
  filePath: string;
  sheetName: string;
  columns: string[];
  rows: ProductRow[];
}

const HEADER_ALIASES: Record<string, TemplateColumn> = {
  title: 'name',
  product_name: 'name',
  regular_price: 'price',
  category: 'categories',
  stock: 'stock_quantity',
  quantity: 'stock_quantity',
  qty: 'stock_quantity',
  images: 'images_path',
  image: 'images_path',
  image_path: 'images_path',
  image_paths: 'images_path'
};

export function normalizeHeader(value: string): string {
  return value.trim().toLowerCase().replace(/\s+/g, '_');
}

export function resolveColumn(header: string): TemplateColumn | undefined {
  const normalized = normalizeHeader(header);
  const known = TEMPLATE_COLUMNS.find(column => column === normalized);
  return known ?? HEADER_ALIASES[normalized];
}

async function loadWorksheet(filePath: string): Promise<Worksheet | undefined> {
  const workbook = new ExcelJS.Workbook();
  const ext = path.extname(filePath).toLowerCase();
  if (ext === '.csv') {
    // keep every cell as the text in the file: no number or date coercion
    return workbook.csv.readFile(filePath, { map: (value: unknown) => value });
  }
  await workbook.xlsx.readFile(filePath);
  return workbook.getWorksheet('Products') ?? workbook.worksheets[0];
}

/**
 * Reads product rows from an .xlsx workbook (the "Products" sheet, or the
 * first sheet) or a .csv file.
 */
export async function readProductSheet(filePath: string): Promise<SheetReadResult> {
  const resolved = path.resolve(filePath);
  const ext = path.extname(resolved).toLowerCase();
  if (ext !== '.xlsx' && ext !== '.csv') {
    throw new IoError(`Unsupported spreadsheet type "${ext || 'none'}" (use .xlsx or .csv)`, resolved);
  }

  try {
    await fs.access(resolved, fs.constants.R_OK);
  } catch (error) {
    throw new IoError(`Cannot read spreadsheet ${resolved}`, resolved, { cause: error });
  }

  let sheet: Worksheet | undefined;
  try {
    sheet = await loadWorksheet(resolved);
  } catch (error) {
    throw new IoError(`Failed to parse ${path.basename(resolved)}: ${describeError(error)}`, resolved, {
      cause: error
    });
  }
  if (!sheet || sheet.actualRowCount === 0) {
    throw new ValidationError(`${path.basename(resolved)} has no header row`);
  }

  const headerRow = sheet.getRow(1);
  const columns: string[] = [];
  const columnIndex = new Map<TemplateColumn, number>();
  for (let col = 1; col <= headerRow.cellCount; col += 1) {
    const header = headerRow.getCell(col).text.trim();
    if (!header) {
      continue;
    }
    columns.push(normalizeHeader(header));
    const column = resolveColumn(header);
    if (column && !columnIndex.has(column)) {
      columnIndex.set(column, col);
    }
  }

  const missing = REQUIRED_COLUMNS.filter(column => !columnIndex.has(column));
  if (missing.length > 0) {
    throw new ValidationError(`Missing required columns: ${missing.join(', ')}`, missing);
  }

  const rows: ProductRow[] = [];
  for (let rowNumber = 2; rowNumber <= sheet.rowCount; rowNumber += 1) {
    const row = sheet.getRow(rowNumber);
    const cell = (column: TemplateColumn): string => {
      const col = columnIndex.get(column);
      return col === undefined ? '' : row.getCell(col).text.trim();
    };

    const values = TEMPLATE_COLUMNS.map(cell);
    if (values.every(value => value === '')) {
      continue;
    }

    rows.push({
      rowNumber,
      name: cell('name'),
      price: cell('price'),
      categories: cell('categories'),
      description: cell('description'),
      stockQuantity: cell('stock_quantity'),
      sku: cell('sku'),
      imagesPath: cell('images_path')
    });
  }

  return {
    filePath: resolved,
    sheetName: sheet.name,
    columns,
    rows
  };
}
