import type { GatewayReader } from '@thermobridge/gateway-client';
import type { BridgeConfig } from './config/serviceConfig';
import type { BridgeMetrics } from './metrics';
import type { SnapshotReader } from './points/snapshot';
import type { TrendPipeline } from './trends/pipeline';

export interface ReadinessState {
  /** Result of the most recent gateway round trip. */
  gateway: boolean;
}

export interface AppContext {
  config: BridgeConfig;
  client: GatewayReader;
  pipeline: TrendPipeline;
  snapshot: SnapshotReader;
  metrics: BridgeMetrics;
  readiness: ReadinessState;
}
