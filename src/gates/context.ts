import type { BlockVerdict, FlagVerdict } from '../types/index.js';

export interface InputGateContext {
  text: string;
  normalized: string;
  gatesPassed: string[];
  verdict?: BlockVerdict | FlagVerdict;
}

export function createGateContext(text: string): InputGateContext {
  return {
    text,
    normalized: text.toLowerCase(),
    gatesPassed: []
  };
}
