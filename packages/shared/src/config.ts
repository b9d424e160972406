/**
 * Centralized Configuration
 *
 * Runtime settings for the certificate worker, tunable via environment
 * variables. Pipeline bounds live in certificate/pipeline-config.ts and are
 * passed explicitly into each pipeline call.
 */

import type { BrokerContext } from './types';

export interface Config {
  // Redis
  redisHost: string;
  redisPort: number;
  redisUrl: string;

  // Queue & Worker
  workerConcurrency: number;
  maxJobAttempts: number;
  backoffBaseMs: number;
  metricsPort: number;

  // CE Broker submission constants
  broker: BrokerContext;
}

function optional(value: string | undefined): string | undefined {
  return value && value.trim() !== '' ? value.trim() : undefined;
}

export const config: Config = {
  // Redis
  redisHost: process.env.REDIS_HOST || 'redis',
  redisPort: parseInt(process.env.REDIS_PORT || '6379', 10),
  redisUrl: process.env.REDIS_URL || 'redis://redis:6379',

  // Queue & Worker
  workerConcurrency: parseInt(process.env.WORKER_CONCURRENCY || '5', 10),
  maxJobAttempts: parseInt(process.env.BULLMQ_DEFAULT_ATTEMPTS || '3', 10),
  backoffBaseMs: parseInt(process.env.BACKOFF_BASE_MS || '2000', 10),
  metricsPort: parseInt(process.env.METRICS_PORT || '9464', 10),

  // CE Broker submission constants (no defaults: absence is reported as CONFIG_INCOMPLETE)
  broker: {
    organization_id: optional(process.env.CE_BROKER_ORGANIZATION_ID),
    form_version: optional(process.env.CE_BROKER_FORM_VERSION),
    licensee_id: optional(process.env.CE_BROKER_LICENSEE_ID),
    default_provider_name: optional(process.env.CE_BROKER_DEFAULT_PROVIDER),
    default_delivery_method: optional(process.env.CE_BROKER_DEFAULT_DELIVERY_METHOD),
  },
};
