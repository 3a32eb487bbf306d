/**
 * 事業計画 生成・検証・修正パイプライン
 */

export * from "./types";
export * from "./errors";
export { loadGenerationConfig, type GenerationConfig, type GenerationConfigOverrides } from "./config";
export { parseFactModel, type FactInput, type FactKey, type FactSourceResult } from "./facts";
export { builtInTemplateStore, type TemplateStore } from "./templates";
export { synthesize } from "./synthesizer";
export { validate, validateDocument } from "./validator";
export { repair, type RepairContext } from "./repair";
export { parseRunRequest, type RunRequest } from "./request";
export { run, type DocumentAssembler, type RunOptions, type SectionTexts } from "./runPipeline";
export { createOpenAiBackend, backendFromEnv, type TextBackend, type TextRequest } from "./llm";
export { createResilientBackend } from "./resilience";
export { createServerLogContext, type LogContext } from "./runPipelineLog";
