import dotenv from 'dotenv';
import {
  Env,
  validateBooleanEnvironmentVariable,
  validateEnvironmentVariable,
  validateNumericEnvironmentVariable
} from '@/utils/env.utils';

dotenv.config();

export interface RuntimeConfig {
  PORT: number;
  NODE_ENV: string;
  LOG_LEVEL: string;
  LOG_TO_FILE: boolean;
  ALLOWED_ORIGINS: string[];
  JSON_BODY_LIMIT: string;
  ALERT_WEBHOOK_URL?: string;
  ENABLE_ALERT_WEBHOOK: boolean;
}

export function loadRuntimeConfig(env: Env = process.env): RuntimeConfig {
  const nodeEnv = validateEnvironmentVariable('NODE_ENV', env.NODE_ENV, false) || 'development';
  const origins = validateEnvironmentVariable('ALLOWED_ORIGINS', env.ALLOWED_ORIGINS, false);

  return {
    PORT: validateNumericEnvironmentVariable('PORT', env.PORT, 3000),
    NODE_ENV: nodeEnv,
    LOG_LEVEL: validateEnvironmentVariable('LOG_LEVEL', env.LOG_LEVEL, false) || 'info',
    LOG_TO_FILE: validateBooleanEnvironmentVariable('LOG_TO_FILE', env.LOG_TO_FILE, nodeEnv !== 'test'),
    ALLOWED_ORIGINS: origins ? origins.split(',').map(o => o.trim()).filter(Boolean) : [],
    JSON_BODY_LIMIT: validateEnvironmentVariable('JSON_BODY_LIMIT', env.JSON_BODY_LIMIT, false) || '1mb',
    ALERT_WEBHOOK_URL: validateEnvironmentVariable('ALERT_WEBHOOK_URL', env.ALERT_WEBHOOK_URL, false) || undefined,
    ENABLE_ALERT_WEBHOOK: validateBooleanEnvironmentVariable('ENABLE_ALERT_WEBHOOK', env.ENABLE_ALERT_WEBHOOK, false),
  };
}

const Config: Readonly<RuntimeConfig> = Object.freeze(loadRuntimeConfig());

export default Config;
