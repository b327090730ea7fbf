import { z } from 'zod';
import { booleanVar, integerVar, jsonVar, loadEnvConfig, portVar, stringVar, type EnvSource } from '@thermobridge/shared';

export const POINT_NAMES = [
  'temperature',
  'zone_setpoint',
  'heating_setpoint',
  'cooling_setpoint',
  'system_mode',
  'peak_savings',
  'fan_status'
] as const;

export type PointName = (typeof POINT_NAMES)[number];

export type PointMap = Readonly<Record<PointName, string>>;

export const DEFAULT_POINTS: PointMap = {
  temperature: 'analog-input,201001',
  zone_setpoint: 'analog-value,1',
  heating_setpoint: 'analog-value,3',
  cooling_setpoint: 'analog-value,2',
  system_mode: 'multi-state-value,2',
  peak_savings: 'binary-value,16',
  fan_status: 'binary-output,1105'
};

const OBJECT_ID_PATTERN = /^[a-z][a-z-]*,\d+$/;

const pointOverridesSchema = z
  .object({
    temperature: z.string().regex(OBJECT_ID_PATTERN),
    zone_setpoint: z.string().regex(OBJECT_ID_PATTERN),
    heating_setpoint: z.string().regex(OBJECT_ID_PATTERN),
    cooling_setpoint: z.string().regex(OBJECT_ID_PATTERN),
    system_mode: z.string().regex(OBJECT_ID_PATTERN),
    peak_savings: z.string().regex(OBJECT_ID_PATTERN),
    fan_status: z.string().regex(OBJECT_ID_PATTERN)
  })
  .partial()
  .strict();

export type CorsOrigin = true | string[];

export interface GatewayConfig {
  baseUrl: string;
  apiRoot: string;
  site: string;
  device: string;
  username: string;
  password: string;
  userAgent: string;
  trendTimeoutMs: number;
  pointTimeoutMs: number;
}

export interface TrendConfig {
  logInstance: number;
  expectedIntervalMs: number;
  maxGapSteps: number;
  maxDisplayPoints: number;
  maxPages: number;
}

export interface BridgeConfig {
  host: string;
  port: number;
  logLevel: string;
  corsOrigin: CorsOrigin;
  gateway: GatewayConfig;
  trend: TrendConfig;
  points: PointMap;
  useDualSetpoints: boolean;
}

const text = (defaultValue: string, pattern?: RegExp) => stringVar({ defaultValue, pattern }).pipe(z.string());
const requiredText = (pattern?: RegExp) => stringVar({ required: true, pattern }).pipe(z.string());
const count = (defaultValue: number) => integerVar({ defaultValue, min: 1 }).pipe(z.number());

const envSchema = z.object({
  BRIDGE_HOST: text('0.0.0.0'),
  BRIDGE_PORT: portVar(8000).pipe(z.number()),
  BRIDGE_LOG_LEVEL: text('info', /^(fatal|error|warn|info|debug|trace|silent)$/),
  BRIDGE_CORS_ORIGIN: text('true'),
  GATEWAY_BASE_URL: requiredText(/^https?:\/\/\S+$/i),
  GATEWAY_API_ROOT: text('enteliweb/api/.bacnet'),
  GATEWAY_SITE: requiredText(),
  GATEWAY_DEVICE: requiredText(),
  GATEWAY_USERNAME: requiredText(),
  GATEWAY_PASSWORD: requiredText(),
  GATEWAY_USER_AGENT: text('thermobridge/0.1'),
  GATEWAY_TREND_TIMEOUT_MS: count(30_000),
  GATEWAY_POINT_TIMEOUT_MS: count(10_000),
  TREND_LOG_INSTANCE: integerVar({ required: true, min: 0 }).pipe(z.number()),
  TREND_EXPECTED_INTERVAL_SECONDS: count(300),
  TREND_MAX_GAP_STEPS: count(48),
  TREND_MAX_DISPLAY_POINTS: count(300),
  TREND_MAX_PAGES: count(50),
  BRIDGE_POINTS: jsonVar({ schema: pointOverridesSchema, defaultValue: {} }).pipe(pointOverridesSchema),
  BRIDGE_USE_DUAL_SETPOINTS: booleanVar({ defaultValue: false }).pipe(z.boolean())
});

type BridgeEnv = z.infer<typeof envSchema>;

function parseCorsOrigin(raw: string): CorsOrigin {
  if (raw === 'true' || raw === '*') {
    return true;
  }
  return raw
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const nested of Object.values(value)) {
    if (nested !== null && typeof nested === 'object' && !Object.isFrozen(nested)) {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
}

function toBridgeConfig(env: BridgeEnv): BridgeConfig {
  return {
    host: env.BRIDGE_HOST,
    port: env.BRIDGE_PORT,
    logLevel: env.BRIDGE_LOG_LEVEL,
    corsOrigin: parseCorsOrigin(env.BRIDGE_CORS_ORIGIN),
    gateway: {
      baseUrl: env.GATEWAY_BASE_URL.replace(/\/+$/, ''),
      apiRoot: env.GATEWAY_API_ROOT,
      site: env.GATEWAY_SITE,
      device: env.GATEWAY_DEVICE,
      username: env.GATEWAY_USERNAME,
      password: env.GATEWAY_PASSWORD,
      userAgent: env.GATEWAY_USER_AGENT,
      trendTimeoutMs: env.GATEWAY_TREND_TIMEOUT_MS,
      pointTimeoutMs: env.GATEWAY_POINT_TIMEOUT_MS
    },
    trend: {
      logInstance: env.TREND_LOG_INSTANCE,
      expectedIntervalMs: env.TREND_EXPECTED_INTERVAL_SECONDS * 1000,
      maxGapSteps: env.TREND_MAX_GAP_STEPS,
      maxDisplayPoints: env.TREND_MAX_DISPLAY_POINTS,
      maxPages: env.TREND_MAX_PAGES
    },
    points: { ...DEFAULT_POINTS, ...env.BRIDGE_POINTS },
    useDualSetpoints: env.BRIDGE_USE_DUAL_SETPOINTS
  };
}

export function loadServiceConfig(env?: EnvSource): BridgeConfig {
  const parsed = loadEnvConfig(envSchema, { env, context: 'bridge-service' });
  return deepFreeze(toBridgeConfig(parsed));
}

/** Configuration safe to expose on the debug endpoint. */
export function describeConfig(config: BridgeConfig) {
  const { baseUrl, apiRoot, site, device, userAgent, trendTimeoutMs, pointTimeoutMs } = config.gateway;
  return {
    gateway: { baseUrl, apiRoot, site, device, userAgent, trendTimeoutMs, pointTimeoutMs },
    trend: config.trend,
    points: config.points,
    useDualSetpoints: config.useDualSetpoints
  };
}
