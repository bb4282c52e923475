export * from './types.js';
export { OllamaProvider, getOllamaProvider } from './ollama.js';
export { requestJson, classifyLlmError } from './structured.js';
