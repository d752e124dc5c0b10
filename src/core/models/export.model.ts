export interface ExportFilter {
  /** Only records held by this owner. */
  owner?: string;
  completedOnly?: boolean;
  /** Directory the export file is written to; defaults to the task's export directory. */
  outputDir?: string;
}

export interface ExportSummary {
  path: string;
  exportedCount: number;
}
