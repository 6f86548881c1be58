
export type DatasetErrorCode = 'MISSING_COLUMN' | 'INVALID_ROW' | 'DUPLICATE_PERIOD' | 'EMPTY_DATASET';

export class DatasetError extends Error {
  constructor(
    public code: DatasetErrorCode,
    message: string,
    public row?: number
  ) {
    super(row === undefined ? message : `Row ${row}: ${message}`);
    this.name = 'DatasetError';
  }
}
