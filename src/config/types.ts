// Configuration-specific types
import { ChainConfig } from '../types';

export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
}

export interface ConfigLoader {
  load(path: string, overrides?: Record<string, unknown>): Promise<ChainConfig>;
  validate(config: unknown): ConfigValidationResult;
}
