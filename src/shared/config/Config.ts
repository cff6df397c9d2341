/**
 * Runtime configuration for the parameter validation service.
 *
 * This centralises environment variables and provides
 * typed access throughout the codebase.
 */
import dotenv from 'dotenv';
import type { ValidationPolicy } from '../../validation/application/ValidationSession';
import { VALIDATION_POLICIES } from '../../validation/application/ValidationSession';

dotenv.config();

export type AppEnv = 'development' | 'test' | 'production';

export interface AppConfig {
  env: AppEnv;
  port: number;
  serviceName: string;
  serviceVersion: string;
  validationPolicy: ValidationPolicy;
  maxUploadBytes: number;
}

const DEFAULT_PORT = 4000;
const DEFAULT_MAX_UPLOAD_BYTES = 5 * 1024 * 1024;

function parsePositiveInt(raw: string | undefined, fallback: number): number {
  const value = raw ? Number(raw) : fallback;
  if (!Number.isInteger(value) || value <= 0) {
    return fallback;
  }
  return value;
}

function parseEnv(raw: string | undefined): AppEnv {
  return raw === 'test' || raw === 'production' ? raw : 'development';
}

function parsePolicy(raw: string | undefined): ValidationPolicy {
  return VALIDATION_POLICIES.find((policy) => policy === raw) ?? 'fail-fast';
}

/**
 * Load configuration from environment variables with sane defaults.
 */
export const config: AppConfig = {
  env: parseEnv(process.env.NODE_ENV),
  port: parsePositiveInt(process.env.PORT, DEFAULT_PORT),
  serviceName: process.env.SERVICE_NAME || 'param-validation-service',
  serviceVersion: process.env.SERVICE_VERSION || '0.1.0',
  validationPolicy: parsePolicy(process.env.VALIDATION_POLICY),
  maxUploadBytes: parsePositiveInt(process.env.MAX_UPLOAD_BYTES, DEFAULT_MAX_UPLOAD_BYTES),
};
