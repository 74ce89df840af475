import type { WarehouseClient } from '../../core/warehouse-client.js';
import type { CostService } from '../cost/cost.service.js';
import type { QueryDetails } from '../cost/types/cost.types.js';
import type { AIService } from './ai.service.js';
import { assembleTablesMetadata } from './metadata-assembler.js';
import { PromptBuilder } from './prompt-builder.js';
import { extractTableReferences } from './table-extractor.js';
import type {
  ExecutionMetadata,
  GroupSummary,
  MetadataValue,
  NameDefaults,
  OptimizationReport,
  OptimizeRequest
} from './types/ai.types.js';

const NO_TABLES_REASON = 'No tables identified in the query';

export class OptimizationError extends Error {
  constructor(
    message: string,
    readonly code: 'QUERY_TEXT_MISSING'
  ) {
    super(message);
    this.name = 'OptimizationError';
  }
}

interface OptimizationServiceDependencies {
  costService: Pick<CostService, 'getQueryDetails'>;
  aiService: Pick<AIService, 'generateSuggestions'>;
  promptBuilder?: PromptBuilder;
  defaults?: NameDefaults;
  defaultModel: string;
}

function iso(value: Date | null | undefined): string | null {
  return value ? value.toISOString() : null;
}

/**
 * Flatten the detail row and the leaderboard group into the prompt's
 * execution facts. Every key is always present; unknowns are null.
 */
export function buildExecutionMetadata(
  queryId: string,
  details: QueryDetails | null,
  group: GroupSummary | undefined
): ExecutionMetadata {
  const pick = <T extends MetadataValue>(value: T | null | undefined): T | null => value ?? null;

  return {
    query_id: queryId,
    query_type: pick(details?.queryType),
    execution_status: pick(details?.executionStatus),
    warehouse_name: pick(details?.warehouseName ?? group?.warehouseName),
    warehouse_size: pick(details?.warehouseSize ?? group?.warehouseSize),
    user_name: pick(details?.userName ?? group?.userName),
    role_name: pick(details?.roleName),
    database_name: pick(details?.databaseName),
    schema_name: pick(details?.schemaName),
    duration_seconds: pick(details?.durationSeconds),
    compilation_time_seconds: pick(details?.compilationTimeSeconds),
    execution_time_seconds: pick(details?.executionTimeSeconds),
    queued_time_seconds: pick(details?.queuedTimeSeconds),
    blocked_time_seconds: pick(details?.blockedTimeSeconds),
    bytes_scanned: pick(details?.bytesScanned),
    bytes_spilled_to_local_storage: pick(details?.bytesSpilledToLocalStorage),
    bytes_spilled_to_remote_storage: pick(details?.bytesSpilledToRemoteStorage),
    partitions_scanned: pick(details?.partitionsScanned),
    partitions_total: pick(details?.partitionsTotal),
    rows_produced: pick(details?.rowsProduced),
    start_time: iso(details?.startTime),
    end_time: iso(details?.endTime),
    group_query_count: pick(group?.queryCount),
    group_duration_seconds: pick(group?.durationSeconds),
    group_cost_factor: pick(group?.costFactor),
    min_start_time: pick(group?.minStartTime),
    max_end_time: pick(group?.maxEndTime)
  };
}

export class OptimizationService {
  private readonly costService: Pick<CostService, 'getQueryDetails'>;
  private readonly aiService: Pick<AIService, 'generateSuggestions'>;
  private readonly promptBuilder: PromptBuilder;
  private readonly defaults: NameDefaults;
  private readonly defaultModel: string;

  constructor(dependencies: OptimizationServiceDependencies) {
    this.costService = dependencies.costService;
    this.aiService = dependencies.aiService;
    this.promptBuilder = dependencies.promptBuilder ?? new PromptBuilder();
    this.defaults = dependencies.defaults ?? {};
    this.defaultModel = dependencies.defaultModel;
  }

  /**
   * Analyze one sample query: extract its tables, gather their catalog
   * metadata and ask Cortex for advice. Cortex is skipped when no table is found.
   */
  async analyze(userId: string, client: WarehouseClient | null, request: OptimizeRequest): Promise<OptimizationReport> {
    const startedAt = Date.now();
    const model = request.model ?? this.defaultModel;
    const details = await this.loadDetails(userId, client, request.queryId);

    const queryText = request.queryText?.trim() ? request.queryText : details?.queryText ?? '';
    if (!queryText.trim()) {
      throw new OptimizationError(`No SQL text available for query ${request.queryId}`, 'QUERY_TEXT_MISSING');
    }

    const executionMetadata = buildExecutionMetadata(request.queryId, details, request.group);
    const tables = extractTableReferences(queryText);

    if (!tables.length) {
      this.log(userId, 'analyze', 'SKIPPED', Date.now() - startedAt, NO_TABLES_REASON);
      return {
        queryId: request.queryId,
        queryText,
        model,
        tables,
        tablesMetadata: {},
        executionMetadata,
        advisory: { status: 'unavailable', suggestions: null, reason: NO_TABLES_REASON }
      };
    }

    const tablesMetadata = await assembleTablesMetadata(client, tables, {
      database: details?.databaseName ?? this.defaults.database ?? null,
      schema: details?.schemaName ?? this.defaults.schema ?? null
    });

    const prompt = this.promptBuilder.buildOptimizationPrompt(queryText, executionMetadata, tablesMetadata);
    const advisory = await this.aiService.generateSuggestions(userId, client, prompt, model);

    this.log(userId, 'analyze', 'SUCCESS', Date.now() - startedAt, `Tables:${tables.length} Advisory:${advisory.status}`);
    return { queryId: request.queryId, queryText, model, tables, tablesMetadata, executionMetadata, advisory };
  }

  private async loadDetails(userId: string, client: WarehouseClient | null, queryId: string): Promise<QueryDetails | null> {
    if (!client) {
      return null;
    }
    try {
      return await this.costService.getQueryDetails(client, queryId);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown warehouse error';
      this.log(userId, 'loadDetails', 'WARN', 0, message);
      return null;
    }
  }

  private log(userId: string, operation: string, status: string, durationMs: number, details: string): void {
    console.log(
      `[${new Date().toISOString()}] [OPTIMIZATION-SERVICE] [USER-${userId}] [${operation}] [${status}] ${durationMs}ms ${details}`
    );
  }
}
