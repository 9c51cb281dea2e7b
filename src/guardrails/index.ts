export { GuardrailEngine } from './engine.js';
