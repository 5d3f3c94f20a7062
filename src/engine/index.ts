export { createEngine } from "./createEngine";
export type { Engine, EngineOptions, CapabilityBackend } from "./createEngine";
