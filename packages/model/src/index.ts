export type {
  ContentBatch,
  ContentNode,
  ExtractionMode,
  ExtractionPayload,
  HeadingNode,
  HeadingType,
  ListNode,
  NamedTable,
  ParagraphNode,
  TableNode,
  TableSet,
} from './content-node';
export { headingLevel, isHeadingNode } from './content-node';
export type {
  EmptyResultReason,
  ExtractionFailure,
  ExtractionOutcome,
  ExtractionSuccess,
} from './extraction-outcome';
export {
  EMPTY_RESULT_REASONS,
  isEmptyResultReason,
} from './extraction-outcome';
export type {
  FinishEvent,
  ProgressEvent,
  ProgressEventType,
  StartEvent,
  StepEvent,
} from './progress-event';
export type {
  TaskControlFlags,
  TaskError,
  TaskState,
  TaskStatus,
} from './task-state';
export { TERMINAL_TASK_STATUSES, isTerminalStatus } from './task-state';
export type {
  PhaseUsageReport,
  TokenUsage,
  TokenUsageReport,
} from './token-usage';
export { EMPTY_USAGE, addUsage } from './token-usage';
export type { ImageRef, WorkItem, WorkItemBatch } from './work-item';
