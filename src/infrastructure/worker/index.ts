export { LineageConsumer } from './lineage-consumer.js';
export type { LineageConsumerOptions, LineageConsumerState } from './lineage-consumer.js';
export { TelemetryConsumer } from './telemetry-consumer.js';
export type {
  TelemetryConsumerOptions,
  TelemetryConsumerState,
  TelemetrySink,
  FlushTrigger,
} from './telemetry-consumer.js';
