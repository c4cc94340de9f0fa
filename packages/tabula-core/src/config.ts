import { z } from 'zod';
import { TabulaConfig } from './types';

/**
 * Environment-aware configuration management
 * Supports environment variables and runtime configuration
 */

const ConfigSchema = z.object({
  enableLogging: z.boolean().optional(),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  floatPrecision: z.number().nonnegative('floatPrecision must be non-negative').optional(),
  maxEvents: z.number().int('maxEvents must be an integer').positive('maxEvents must be positive').optional()
});

const LEVELS = ['debug', 'info', 'warn', 'error'] as const;

const parseLogLevel = (raw: string | undefined): TabulaConfig['logLevel'] =>
  LEVELS.find(level => level === raw) ?? 'info';

// Create configuration from environment variables
export const createConfigFromEnv = (): TabulaConfig => ({
  enableLogging: process.env.TABULA_LOGGING === 'true' ||
                process.env.NODE_ENV === 'development',
  logLevel: parseLogLevel(process.env.TABULA_LOG_LEVEL),
  floatPrecision: parseFloat(process.env.TABULA_FLOAT_PRECISION || '0.001'),
  maxEvents: parseInt(process.env.TABULA_MAX_EVENTS || '1000', 10)
});

const DEFAULT_CONFIG: TabulaConfig = {
  enableLogging: false,
  logLevel: 'info',
  floatPrecision: 0.001,
  maxEvents: 1000
};

// Current configuration
let currentConfig: TabulaConfig = { ...DEFAULT_CONFIG };

/**
 * Configure the library
 */
export const configure = (config: Partial<TabulaConfig>): void => {
  currentConfig = { ...currentConfig, ...config };
};

/**
 * Get current configuration
 */
export const getConfig = (): TabulaConfig => {
  return { ...currentConfig };
};

/**
 * Reset to default configuration
 */
export const resetConfig = (): void => {
  currentConfig = { ...DEFAULT_CONFIG };
};

/**
 * Validate configuration
 */
export const validateConfig = (config: TabulaConfig): { valid: boolean; errors: string[] } => {
  const result = ConfigSchema.safeParse(config);
  if (result.success) {
    return { valid: true, errors: [] };
  }

  return {
    valid: false,
    errors: result.error.issues.map(issue => issue.message)
  };
};

// Auto-initialize on module load
if (typeof process !== 'undefined' && process.env) {
  const envConfig = createConfigFromEnv();
  const validation = validateConfig(envConfig);

  if (!validation.valid) {
    console.warn('Invalid configuration from environment:', validation.errors);
    console.warn('Using default configuration');
  } else {
    currentConfig = envConfig;
  }
}
