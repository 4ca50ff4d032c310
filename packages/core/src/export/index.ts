export {
  EXPORT_COLUMNS,
  ExportFormat,
  DEFAULT_TAG_DELIMITER,
  parseExportFormat,
  toExportRow,
  formatJson,
  formatCsv,
  exportTasks,
  defaultExportFileName,
} from './export.js';
export type { ExportColumn, ExportRow, ExportOptions } from './export.js';
