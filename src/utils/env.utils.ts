import { ConfigurationError } from '@/utils/errors';

export type Env = Record<string, string | undefined>;

export function validateEnvironmentVariable(name: string, value: string | undefined, required: boolean = true): string {
  if (!value && required) {
    throw new ConfigurationError(`Required environment variable ${name} is not set`);
  }

  if (!value && !required) {
    return '';
  }

  if (value && value.trim() === '') {
    throw new ConfigurationError(`Environment variable ${name} cannot be empty`);
  }

  return value || '';
}

export function validateNumericEnvironmentVariable(name: string, value: string | undefined, defaultValue: number): number {
  const stringValue = validateEnvironmentVariable(name, value, false);

  if (!stringValue) {
    return defaultValue;
  }

  const numericValue = Number(stringValue.trim());

  if (!Number.isFinite(numericValue)) {
    throw new ConfigurationError(`Environment variable ${name} must be a valid number, got: ${stringValue}`);
  }

  return numericValue;
}

export function validateBooleanEnvironmentVariable(name: string, value: string | undefined, defaultValue: boolean): boolean {
  const stringValue = validateEnvironmentVariable(name, value, false).trim().toLowerCase();

  if (!stringValue) {
    return defaultValue;
  }
  if (stringValue === 'true') {
    return true;
  }
  if (stringValue === 'false') {
    return false;
  }

  throw new ConfigurationError(`Environment variable ${name} must be 'true' or 'false', got: ${value}`);
}
