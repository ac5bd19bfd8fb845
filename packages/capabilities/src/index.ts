// LLM boundary
export * from './services/llm/response-generator.js';
export * from './services/llm/response-formatter.js';
export * from './services/llm/persona-prompt.js';
export * from './services/llm/fallback-replies.js';

// Intent
export * from './services/intent/intent-types.js';
export * from './services/intent/intent-classifier.js';
export { parseBareNumber, parseLocalNumber, parseSpelledNumber } from './services/intent/number-words.js';

// Memory
export * from './services/memory/fact-buckets.js';
export * from './services/memory/fact-store.js';
export * from './services/memory/profile-repository.js';

// Context
export * from './services/context/channel-memory.js';
export * from './services/context/context-builder.js';

// Games
export * from './services/game/game-manager.js';
