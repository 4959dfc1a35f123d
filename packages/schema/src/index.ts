// ESM + NodeNext: include .js on local imports
export {
  StatusCodeEnum,
  StageSchema,
  SignalSchema,
  HistoryEntrySchema,
  ReasoningSchema,
  EventSchema,
  FlatDocumentSchema,
  PreviewDirectiveSchema,
  DirectiveDocumentSchema,
} from "./schemas.js";

export type {
  StatusCode,
  Stage,
  Signal,
  HistoryEntry,
  Reasoning,
  DesignEvent,
  FlatDocument,
  PreviewDirective,
  DirectiveDocument,
  DesignDocument,
} from "./schemas.js";

export { parseDesignDocument, describeIssues, formatIssuePath } from "./shape.js";
export type { SchemaIssue, ShapeResult } from "./shape.js";
