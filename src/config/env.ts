/**
 * Environment variable helpers shared by the config modules
 */

import { config } from 'dotenv';

// Load environment variables
config();

/**
 * Get environment variable or throw error if required and missing
 */
export function getEnvVar(key: string, required: boolean = false, defaultValue?: string): string {
  const value = process.env[key] || defaultValue;

  if (required && !value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }

  return value || '';
}

/**
 * Parse a positive integer from an environment variable
 */
export function getEnvInt(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) {
    return defaultValue;
  }

  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed <= 0) {
    console.warn(`Invalid integer value for ${key}: ${value}, using default: ${defaultValue}`);
    return defaultValue;
  }

  return parsed;
}

/**
 * Read an environment variable constrained to a fixed set of values
 */
export function getEnvChoice<T extends string>(key: string, choices: readonly T[], defaultValue: T): T {
  const value = process.env[key];
  if (!value) {
    return defaultValue;
  }

  const choice = choices.find((candidate) => candidate === value);
  if (!choice) {
    throw new Error(`Invalid value for ${key}: ${value}. Must be one of: ${choices.join(', ')}`);
  }
  return choice;
}
