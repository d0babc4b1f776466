export {
  parseDocumentsCsv,
  readDocumentsCsv,
  validateDocuments,
  REQUIRED_COLUMNS,
} from "./csv-reader";
export {
  generateDocumentsCsv,
  writeDocumentsCsv,
  createSampleCsv,
  buildSampleRows,
  escapeField,
  UTF8_BOM,
} from "./csv-writer";
export {
  createDocumentRecord,
  DOCUMENT_STATUS_LABELS,
  HANDLED_REMARK,
  type DocumentRecord,
  type DocumentInput,
  type DocumentStatus,
} from "./types";
