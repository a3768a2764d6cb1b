/**
 * vm-rightsizer: cost-reducing VM rightsizing recommendations
 * Public SDK exports for programmatic usage
 *
 * @example
 * ```typescript
 * import { AnalysisOrchestrator, ConfigManager, SnapshotCloud, toScoringPolicy } from 'vm-rightsizer';
 *
 * const config = new ConfigManager().load();
 * const cloud = SnapshotCloud.fromFile('inventory.yaml');
 * const orchestrator = new AnalysisOrchestrator(
 *   { inventory: cloud, catalog: cloud, prices: cloud },
 *   {
 *     policy: toScoringPolicy(config),
 *     workers: config.concurrency.workers,
 *     instanceTimeoutMs: config.concurrency.instanceTimeoutMs,
 *     batchTimeoutMs: config.concurrency.batchTimeoutMs,
 *     lookbackDays: config.analysis.lookbackDays,
 *     includeMetrics: true,
 *     includeAi: false,
 *   },
 * );
 * const report = await orchestrator.run();
 * ```
 */

// Core
export { EventBus } from './core/events.js';
export { ConfigManager, toScoringPolicy } from './core/config.js';
export { getLogger, setLogger, createLogger, type Logger } from './core/logger.js';
export { AsyncMutex, AsyncSemaphore } from './core/mutex.js';
export {
  RightsizerError,
  ConfigError,
  ProviderError,
  CollaboratorError,
  AnalysisTimeoutError,
} from './core/errors.js';
export {
  RightsizerConfigSchema,
  type RightsizerConfig,
  type RightsizerConfigInput,
  type RightsizerEvents,
} from './core/types.js';

// Rightsizing
export * from './rightsizing/index.js';

// AI
export * from './ai/index.js';

// Providers
export type { CompletionProvider, CompletionRequest, ProviderConfig } from './providers/types.js';
export { BaseCompletionProvider } from './providers/base.js';
export { AnthropicCompletionProvider } from './providers/anthropic.js';
export { OpenAICompletionProvider } from './providers/openai.js';
export { createCompletionProvider } from './providers/registry.js';

// Collaborators
export * from './collaborators/index.js';

// Reports
export * from './report/index.js';

// Utils
export { retry, isTransientError, sleep, withTimeout, type RetryOptions } from './utils/retry.js';
export { runBounded, type TaskOutcome, type BoundedRunOptions } from './utils/pool.js';

export { VERSION, NAME } from './version.js';
