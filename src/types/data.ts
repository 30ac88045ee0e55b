// Physical files, table bindings and SQL result payloads
export interface PhysicalFile {
  name: string;
  path: string;
  size_bytes: number;
  modified: number;
  block_range: string;
  is_latest: boolean;
}

// One logical table bound to its FileSet
export interface TableBinding {
  table: string;
  files: string[];
  combined: boolean;
}

export type TableMappings = Record<string, { files: string[]; combined: boolean }>;

export interface ResultSchema {
  columns: string[];
  dtypes: Record<string, string>;
}

export interface SqlSuccess {
  success: true;
  result: Record<string, unknown>[];
  row_count: number;
  schema: ResultSchema | null;
  files_used: string[];
  used_direct_references: boolean;
  table_mappings: TableMappings | null;
}

export interface SqlFailure {
  success: false;
  error: string;
  // Absent when there was nothing to query at all
  files_available?: string[];
}

export type SqlResult = SqlSuccess | SqlFailure;

export interface ColumnInfo {
  column_name: string;
  data_type: string;
}

export type SchemaResult =
  | {
      success: true;
      file_path: string;
      columns: ColumnInfo[];
      sample_data: Record<string, unknown>[];
      row_count: number;
    }
  | { success: false; error: string };
