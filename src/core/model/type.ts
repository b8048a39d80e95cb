export interface ModelLoadOption {
  temperature?: number;
  maxTokens?: number;
  topP?: number;
  extraBody?: Record<string, unknown>;
}
