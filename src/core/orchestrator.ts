import { SyncConfig } from '../config/config.js';
import { EngineFactory } from '../engines/factory.js';
import { IDbConnection, IDDLGenerator, IMetadataCatalog } from '../engines/interfaces.js';
import { ScriptGenerator } from '../generator/generator.js';
import { ExtractionResult, SchemaInspector } from '../inspector/inspector.js';
import { ComparisonResult } from '../types/comparison.js';
import { SchemaModel, SyncWarning } from '../types/index.js';
import { Plan, Selection } from '../types/plan.js';
import { logger } from '../utils/logger.js';
import { SQLWriter } from '../writer/writer.js';
import { SchemaComparator } from './comparator.js';
import { describeError } from './errors.js';
import { ExecutionReport, StatementExecutor } from './executor.js';
import { PlanBuilder } from './planner.js';

export interface SyncEndpoint {
  connection: IDbConnection;
  catalog: IMetadataCatalog;
}

export interface ComparisonSnapshot {
  source: SchemaModel;
  target: SchemaModel;
  result: ComparisonResult;
  warnings: SyncWarning[];
}

export interface SyncScripts {
  plan: Plan;
  structure: string[];
  data: string[];
  warnings: SyncWarning[];
}

export interface WrittenScripts {
  structurePath: string | null;
  dataPath: string | null;
}

export class SyncOrchestrator {
  private comparator = new SchemaComparator();
  private planner = new PlanBuilder(this.comparator);
  private scripts: ScriptGenerator;

  constructor(
    private config: SyncConfig,
    private source: SyncEndpoint,
    private target: SyncEndpoint,
    ddl: IDDLGenerator = EngineFactory.createGenerator(config.engine)
  ) {
    this.scripts = new ScriptGenerator(ddl);
  }

  static connect(config: SyncConfig): SyncOrchestrator {
    const endpoint = (side: SyncConfig['source']): SyncEndpoint => {
      const connection = EngineFactory.createConnection(config.engine, side);
      return { connection, catalog: EngineFactory.createCatalog(config.engine, connection) };
    };
    return new SyncOrchestrator(config, endpoint(config.source), endpoint(config.target));
  }

  async compare(): Promise<ComparisonSnapshot> {
    const [sourceOutcome, targetOutcome] = await Promise.allSettled([
      new SchemaInspector(this.source.catalog).extract(this.config.source.database),
      new SchemaInspector(this.target.catalog).extract(this.config.target.database),
    ]);

    const unwrap = (side: string, outcome: PromiseSettledResult<ExtractionResult>): ExtractionResult => {
      if (outcome.status === 'rejected') {
        logger.error({ side, error: describeError(outcome.reason) }, 'Extraction failed');
        throw outcome.reason;
      }
      return outcome.value;
    };

    const source = unwrap('source', sourceOutcome);
    const target = unwrap('target', targetOutcome);
    const result = this.comparator.analyze(source.schema, target.schema);

    return {
      source: source.schema,
      target: target.schema,
      result,
      warnings: [...source.warnings, ...target.warnings, ...result.warnings],
    };
  }

  plan(snapshot: ComparisonSnapshot, selection: Selection, generatedAt: Date = new Date()): SyncScripts {
    const { plan, warnings } = this.planner.build(snapshot.result.classification, selection, snapshot.source, snapshot.target);

    const context = {
      sourceDatabase: snapshot.source.database,
      targetDatabase: snapshot.target.database,
      generatedAt,
      sourceConnection: {
        host: this.config.source.host,
        port: this.config.source.port,
        user: this.config.source.user,
      },
    };

    logger.info(
      { structureOperations: plan.structure.length, dataTables: plan.dataSync.length, warnings: warnings.length },
      'Migration plan built'
    );

    return {
      plan,
      structure: this.scripts.renderStructure(plan, context),
      data: this.scripts.renderDataPlan(plan, context),
      warnings,
    };
  }

  async write(scripts: SyncScripts, writer: SQLWriter): Promise<WrittenScripts> {
    const structurePath = await writer.save('structure', scripts.structure);
    const dataPath = await writer.save('data', scripts.data);
    return { structurePath, dataPath };
  }

  async apply(scripts: SyncScripts): Promise<ExecutionReport> {
    return new StatementExecutor(this.target.connection).apply(scripts.structure);
  }

  async close() {
    await Promise.all([this.source.connection.close(), this.target.connection.close()]);
  }
}
