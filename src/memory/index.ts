export { ConversationMemory, type ContextSummary, type FactKey } from './conversation.js';
