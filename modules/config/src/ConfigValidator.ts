import { promises as fs } from 'node:fs';
import { Ajv, type ValidateFunction } from 'ajv';
import { harvestConfigSchema } from './schemas/index.js';
import { getDefaultConfig } from './defaults.js';
import type { HarvestConfig, ValidationResult } from './types.js';

/**
 * Validates harvest configuration objects against `harvestConfigSchema` with AJV.
 */
export class ConfigValidator {
  private ajv: Ajv;
  private validateFn: ValidateFunction<HarvestConfig>;

  constructor() {
    this.ajv = new Ajv({
      allErrors: true,
      verbose: true,
      strict: false,
      allowUnionTypes: true,
    });
    this.validateFn = this.ajv.compile<HarvestConfig>(harvestConfigSchema);
  }

  isHarvestConfig(config: unknown): config is HarvestConfig {
    return this.validateFn(config);
  }

  validate(config: unknown): ValidationResult {
    if (this.validateFn(config)) {
      return { valid: true };
    }

    const errors =
      this.validateFn.errors?.map((error) => ({
        path: error.instancePath || '/root',
        message: error.message || 'unknown error',
      })) || [];

    return {
      valid: false,
      errors,
    };
  }

  async validateFile(configPath: string): Promise<ValidationResult> {
    try {
      const content = await fs.readFile(configPath, 'utf-8');
      const config: unknown = JSON.parse(content);
      return this.validate(config);
    } catch (error) {
      return {
        valid: false,
        errors: [
          {
            path: configPath,
            message: error instanceof Error ? error.message : 'failed to read or parse config file',
          },
        ],
      };
    }
  }

  getDefaultConfig(): HarvestConfig {
    return getDefaultConfig();
  }
}

export function formatValidationErrors(result: ValidationResult): string {
  return (result.errors ?? []).map((e) => `  - ${e.path}: ${e.message}`).join('\n');
}
