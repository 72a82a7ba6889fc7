export { loadConfig } from './config/index.js';
export { HealboxError, PreconditionError, InfrastructureError } from './errors.js';
export { DockerRuntime } from './sandbox/docker.js';
export { SandboxSession } from './sandbox/session.js';
export { DependencyResolver } from './sandbox/deps.js';
export { CommandExecutor } from './sandbox/executor.js';
export { FileSynchronizer } from './sandbox/sync.js';
export { RepairOrchestrator } from './heal/orchestrator.js';
export { LlmPatchGenerator } from './heal/patch-generator.js';
export { parsePatchResponse, formatFileBlock } from './heal/patch-parser.js';
export { HealingService } from './heal/service.js';
export { createLLMAdapter } from './llm/factory.js';
export { buildServer } from './server/index.js';
export { VERSION } from './version.js';
export type { ContainerRuntime, ContainerSettings } from './sandbox/types.js';
export type { PatchGenerator, PatchRequest } from './heal/patch-generator.js';
export type {
  FileSet, ExecutionResult, SandboxRunResult, HealingAttempt, HealingSession, HealingResult,
} from './types.js';
