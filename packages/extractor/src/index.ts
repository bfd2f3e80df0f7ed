export {
  EXTRACTION_CLIENT,
  EXTRACTION_PIPELINE,
  IMAGE_MEDIA_TYPES,
  PDF_IMAGE_SOURCE,
  SOURCE_MODES,
  TASK_REGISTRY,
  type SourceMode,
} from './config/constants';
export {
  extractionEnvSchema,
  loadExtractionConfig,
  type ExtractionConfig,
} from './config/extraction-config';
export { createExtractionModel } from './config/model-factory';
export {
  TABLE_EXTRACTION_PROMPT,
  TEXT_EXTRACTION_PROMPT,
} from './config/prompts';
export {
  ExtractionClient,
  mediaTypeOf,
  type ExtractionClientOptions,
} from './core/extraction-client';
export {
  ExtractionPipeline,
  type ExtractionPipelineOptions,
  type ItemExtractor,
  type PipelineRunResult,
} from './core/extraction-pipeline';
export {
  ExtractionService,
  computeElapsedMs,
  type ExtractionServiceOptions,
  type SubmitRequest,
  type TaskRun,
  type TaskStatusView,
} from './core/extraction-service';
export {
  ConfigError,
  ExtractionError,
  WorkItemSourceError,
} from './errors/extraction-error';
export { ContentParser } from './parsers/content-parser';
export {
  parseCommaSeparated,
  parseMarkdownTable,
} from './parsers/delimited-table-parser';
export { repairNamedTable, repairTable } from './parsers/table-repair';
export {
  PipelineEventChannel,
  type ProgressListener,
} from './pipeline/pipeline-event-channel';
export {
  ProgressAggregator,
  type ProgressAggregatorOptions,
} from './pipeline/progress-aggregator';
export { ResultOrderer, type OrderedResult } from './pipeline/result-orderer';
export {
  TaskRegistry,
  type TaskInit,
  type TaskRegistryOptions,
} from './pipeline/task-registry';
export { ImageFileSource } from './sources/image-file-source';
export {
  PdfImageSource,
  type PdfImageSourceOptions,
} from './sources/pdf-image-source';
export {
  compareNatural,
  type WorkItemSource,
} from './sources/work-item-source';
export type {
  DocumentWriter,
  ExtractedDocument,
  TableDocument,
  TextDocument,
} from './writers/document-writer';
export { JsonDocumentWriter } from './writers/json-document-writer';
export { MarkdownDocumentWriter } from './writers/markdown-document-writer';
export {
  EMPTY_DOCUMENT_NOTICE,
  MarkdownRenderer,
} from './writers/markdown-renderer';
