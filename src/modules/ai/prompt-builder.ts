import { isRecord } from '../../core/row-values.js';
import type { ExecutionMetadata, TablesMetadata } from './types/ai.types.js';

/**
 * Canonical form for the prompt: object keys sorted at every level, Dates as
 * ISO strings, `undefined` as null, bigint as a decimal string.
 */
function canonicalize(value: unknown, ancestors: Set<object>): unknown {
  if (value === undefined) return null;
  if (typeof value === 'bigint') return value.toString();
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value.toISOString();
  if (typeof value !== 'object' || value === null) return value;

  if (ancestors.has(value)) {
    throw new TypeError('Converting circular structure to JSON');
  }
  ancestors.add(value);

  let result: unknown;
  if (Array.isArray(value)) {
    result = value.map((item: unknown) => canonicalize(item, ancestors));
  } else if (isRecord(value)) {
    result = Object.fromEntries(
      Object.keys(value)
        .sort()
        .map((key) => [key, canonicalize(value[key], ancestors)])
    );
  } else {
    result = value;
  }

  ancestors.delete(value);
  return result;
}

export function toCanonicalJson(value: unknown): string {
  return JSON.stringify(canonicalize(value, new Set<object>()), null, 2);
}

export class PromptBuilder {
  /**
   * Build the Cortex prompt asking for SQL, warehouse and general cost advice.
   * Deterministic: equal inputs give byte-identical prompts.
   */
  buildOptimizationPrompt(
    queryText: string,
    executionMetadata: ExecutionMetadata,
    tablesMetadata: TablesMetadata
  ): string {
    return `You are an expert in SQL query optimization on Snowflake.

Analyze the following SQL query and provide detailed optimization suggestions.

## SQL query to analyze:

\`\`\`sql
${queryText}
\`\`\`

## Execution metadata:

${toCanonicalJson(executionMetadata)}

## Metadata of tables used:

${toCanonicalJson(tablesMetadata)}

## Instructions:

Provide a complete analysis with:

1. **SQL Optimizations**:
   - Query rewrite suggestions
   - JOIN improvements
   - WHERE clause optimization
   - Use of clustering keys or search optimization
   - CTE or subquery suggestions

2. **Warehouse-related optimizations**:
   - Recommended warehouse size
   - Use of multi-clustering
   - Auto-suspend and auto-resume
   - Concurrency management

3. **General optimizations**:
   - Execution time improvement
   - Cost reduction
   - Snowflake best practices

Format your response clearly and structured with well-defined sections.`;
  }
}

export const promptBuilder = new PromptBuilder();

export function buildOptimizationPrompt(
  queryText: string,
  executionMetadata: ExecutionMetadata,
  tablesMetadata: TablesMetadata
): string {
  return promptBuilder.buildOptimizationPrompt(queryText, executionMetadata, tablesMetadata);
}
