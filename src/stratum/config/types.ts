/**
 * Configuration types for the stratum runtime
 */

import { z } from "zod";

/**
 * Reasoning strategy variants
 */
export const StrategyNameSchema = z.enum([
  "react",
  "chain_of_thought",
  "tree_of_thoughts",
  "graph_of_thoughts",
  "recursive",
]);

export type StrategyName = z.infer<typeof StrategyNameSchema>;

/**
 * Model call settings
 */
export const LlmConfigSchema = z.object({
  /** Deadline for a single model call (ms) */
  timeoutMs: z.number().int().positive().default(60000),
  /** Maximum tokens requested per call */
  maxTokens: z.number().int().positive().default(1024),
  /** Sampling temperature */
  temperature: z.number().min(0).max(2).default(0.2),
});

export type LlmConfig = z.infer<typeof LlmConfigSchema>;

/**
 * Tool execution contract defaults
 */
export const ToolExecConfigSchema = z.object({
  /** Per-attempt deadline (ms) */
  timeoutMs: z.number().int().positive().default(15000),
  /** Retries after the first attempt */
  maxRetries: z.number().int().min(0).default(1),
  /** Fixed wait between attempts (ms) */
  retryBackoffMs: z.number().int().min(0).default(200),
  /** Tool calls executed at once per runtime */
  concurrency: z.number().int().positive().default(4),
  /** Serialized result size cap (bytes) */
  maxResultBytes: z.number().int().positive().default(10000),
});

export type ToolExecConfig = z.infer<typeof ToolExecConfigSchema>;

/**
 * Checkpoint token settings
 */
export const CheckpointConfigSchema = z.object({
  /** HMAC secret used to sign tokens */
  secret: z.string().min(1).default("stratum-local-secret"),
  /** Token lifetime (ms); tokens never expire when unset */
  ttlMs: z.number().int().positive().optional(),
  /** Gzip the payload */
  compress: z.boolean().default(false),
});

export type CheckpointConfig = z.infer<typeof CheckpointConfigSchema>;

/**
 * Recursive fan-out settings
 */
export const DelegationConfigSchema = z.object({
  /** Levels of children a root request may spawn */
  maxDepth: z.number().int().min(0).default(1),
  /** Contexts with more lines than this are fanned out */
  contextThresholdLines: z.number().int().min(0).default(40),
  /** Lines per chunk */
  chunkLines: z.number().int().positive().default(34),
  /** Children allowed across a whole worker tree */
  maxChildrenTotal: z.number().int().min(0).default(8),
  /** Tokens allowed across a whole worker tree */
  tokenBudget: z.number().int().positive().default(200000),
  /** Characters kept from each child answer for synthesis */
  findingChars: z.number().int().positive().default(400),
});

export type DelegationConfig = z.infer<typeof DelegationConfigSchema>;

export const TreeOfThoughtsConfigSchema = z.object({
  branchingFactor: z.number().int().min(1).default(3),
  maxDepth: z.number().int().min(1).default(2),
});

export type TreeOfThoughtsConfig = z.infer<typeof TreeOfThoughtsConfigSchema>;

/**
 * How a graph's scored thoughts become one answer
 *
 * - synthesis: the model combines them in a final call
 * - voting: the most common conclusion wins
 * - weighted: conclusions are weighted by their thoughts' scores
 */
export const AggregationStrategySchema = z.enum(["synthesis", "voting", "weighted"]);

export type AggregationStrategy = z.infer<typeof AggregationStrategySchema>;

export const GraphOfThoughtsConfigSchema = z.object({
  /** Thoughts proposed per expansion */
  branchingFactor: z.number().int().min(1).default(3),
  /** Nodes in the graph, root included */
  maxNodes: z.number().int().min(2).default(20),
  /** Expansion rounds before aggregating */
  maxDepth: z.number().int().min(1).default(3),
  aggregation: AggregationStrategySchema.default("synthesis"),
});

export type GraphOfThoughtsConfig = z.infer<typeof GraphOfThoughtsConfigSchema>;

/**
 * Logging configuration
 */
export const LoggingConfigSchema = z.object({
  /** Log level */
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
  /** Directory for log files */
  logDir: z.string().optional(),
  /** Enable structured JSON logging */
  jsonLogs: z.boolean().default(false),
  /** Include timestamps */
  timestamps: z.boolean().default(true),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

/**
 * Main stratum configuration
 */
export const StratumConfigSchema = z.object({
  /** Config version */
  version: z.literal(1).default(1),
  /** Strategy used when a runtime is created without one */
  strategy: StrategyNameSchema.default("react"),
  /** Model identifier passed through to the backend */
  model: z.string().default("scripted:default"),
  /** Overrides the strategy's system prompt */
  systemPrompt: z.string().optional(),
  /** Model turns allowed per request */
  maxIterations: z.number().int().positive().default(10),
  /** Repair prompts allowed for unparsable replies */
  maxParseRetries: z.number().int().min(0).default(1),
  llm: LlmConfigSchema.optional().default({
    timeoutMs: 60000,
    maxTokens: 1024,
    temperature: 0.2,
  }),
  toolExec: ToolExecConfigSchema.optional().default({
    timeoutMs: 15000,
    maxRetries: 1,
    retryBackoffMs: 200,
    concurrency: 4,
    maxResultBytes: 10000,
  }),
  checkpoint: CheckpointConfigSchema.optional().default({
    secret: "stratum-local-secret",
    compress: false,
  }),
  delegation: DelegationConfigSchema.optional().default({
    maxDepth: 1,
    contextThresholdLines: 40,
    chunkLines: 34,
    maxChildrenTotal: 8,
    tokenBudget: 200000,
    findingChars: 400,
  }),
  treeOfThoughts: TreeOfThoughtsConfigSchema.optional().default({
    branchingFactor: 3,
    maxDepth: 2,
  }),
  graphOfThoughts: GraphOfThoughtsConfigSchema.optional().default({
    branchingFactor: 3,
    maxNodes: 20,
    maxDepth: 3,
    aggregation: "synthesis" as const,
  }),
  /** Logging settings */
  logging: LoggingConfigSchema.optional().default({
    level: "info" as const,
    jsonLogs: false,
    timestamps: true,
  }),
});

export type StratumConfig = z.infer<typeof StratumConfigSchema>;

/**
 * Default configuration
 */
export function getDefaultConfig(): StratumConfig {
  return StratumConfigSchema.parse({});
}
