export const TEMPLATE_COLUMNS = [
  'name',
  'price',
  'categories',
  'description',
  'stock_quantity',
  'sku',
  'images_path'
] as const;

export type TemplateColumn = typeof TEMPLATE_COLUMNS[number];

export const REQUIRED_COLUMNS: readonly TemplateColumn[] = ['name', 'price'];

/** One spreadsheet line, every cell still raw text. */
export interface ProductRow {
  rowNumber: number;
  name: string;
  price: string;
  categories: string;
  description: string;
  stockQuantity: string;
  sku: string;
  imagesPath: string;
  source?: string;
}

export interface ProductRecord {
  readonly rowNumber: number;
  readonly name: string;
  readonly price: number;
  readonly regularPrice: string;
  readonly categories: readonly string[];
  readonly description: string;
  readonly stockQuantity: number;
  readonly sku?: string;
  readonly imagePaths: readonly string[];
  readonly source?: string;
}

export interface FieldError {
  column: TemplateColumn;
  message: string;
}

export type ValidationResult =
  | { kind: 'valid'; record: ProductRecord }
  | { kind: 'invalid'; rowNumber: number; row: ProductRow; errors: FieldError[] };

export type FailureKind = 'network' | 'timeout' | 'auth' | 'rejected' | 'rate_limited' | 'unknown';

export type UploadStatus =
  | { state: 'pending' }
  | { state: 'in_progress'; startedAt: Date }
  | { state: 'succeeded'; remoteId: number; completedAt: Date }
  | { state: 'failed'; reason: string; kind: FailureKind; completedAt: Date };


export interface QueueItem {
  readonly id: string;
  readonly record: ProductRecord;
  status: UploadStatus;
  warnings: string[];
  attempts: number;
}

export interface QueueSnapshotEntry {
  readonly id: string;
  readonly record: ProductRecord;
  readonly status: UploadStatus;
  readonly warnings: readonly string[];
  readonly attempts: number;
}

export interface QueueCounts {
  total: number;
  pending: number;
  inProgress: number;
  succeeded: number;
  failed: number;
}
