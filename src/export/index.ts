export { runExport, orderEvents, enrichDescriptions, resolveUidDomain } from './pipeline.js';
export type { ExportOptions, ExportReport, StepRunner } from './pipeline.js';
