export { RunOrchestrator, parseLoadPlan, runSucceeded } from './run-orchestrator.js';
export type { RecordProvider, RunOrchestratorOptions } from './run-orchestrator.js';
export { orderByDependencies } from './dependency-order.js';
export type { DependencyNode } from './dependency-order.js';
