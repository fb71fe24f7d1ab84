export { serializeTopology, formatAttributeBag, formatAttributeValue } from "./TopologySerializer";
export { toDocument, exportTopology, isExportFormat, EXPORT_FORMATS } from "./DocumentExporter";
export type { ExportFormat } from "./DocumentExporter";
