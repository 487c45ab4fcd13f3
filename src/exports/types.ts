export type ExportType = 'csv' | 'nd_json' | 'json';

export interface FileExport {
  /** Absolute folder the file is written to */
  readonly folder: string;
  /** File name without extension */
  readonly name: string;
  /** strftime format (`%Y%m%d`) appended to the name */
  readonly dateFormat?: string;
}

export type ExportItem =
  | (FileExport & { readonly type: 'csv'; readonly sink: boolean })
  | (FileExport & { readonly type: 'nd_json' })
  | (FileExport & { readonly type: 'json' });
