export * from './types/index.js';
export * from './types/comparison.js';
export * from './types/plan.js';
export * from './core/errors.js';
export { SchemaInspector, type ExtractionResult } from './inspector/inspector.js';
export { SchemaComparator, compareColumns, columnsEqual, normalizeDefault, normalizeExtra, normalizeType } from './core/comparator.js';
export { PlanBuilder } from './core/planner.js';
export { ScriptGenerator, type RenderContext } from './generator/generator.js';
export { StatementExecutor, isExecutable, type ExecutionOptions, type ExecutionReport } from './core/executor.js';
export {
  SyncOrchestrator,
  type ComparisonSnapshot,
  type SyncEndpoint,
  type SyncScripts,
  type WrittenScripts,
} from './core/orchestrator.js';
export { EngineFactory } from './engines/factory.js';
export type { IDbConnection, IDbSession, IDDLGenerator, IMetadataCatalog, MetadataRow } from './engines/interfaces.js';
export { MysqlCatalog } from './engines/mysql/MysqlCatalog.js';
export { MysqlConnection } from './engines/mysql/MysqlConnection.js';
export { MysqlDDLGenerator, quoteIdentifier } from './engines/mysql/MysqlDDLGenerator.js';
export { SQLWriter, type ScriptKind } from './writer/writer.js';
export { SchemaExporter, type ExportRow } from './utils/exporter.js';
export { loadSyncConfig, syncConfigSchema, type SyncConfig } from './config/config.js';
export { loadSelection, parseSelection, selectionFileSchema } from './config/selection.js';
