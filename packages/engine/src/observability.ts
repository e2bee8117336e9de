import { context, metrics, SpanStatusCode, trace } from "@opentelemetry/api";
import { OTLPMetricExporter } from "@opentelemetry/exporter-metrics-otlp-http";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";
import { Resource } from "@opentelemetry/resources";
import { MeterProvider, PeriodicExportingMetricReader } from "@opentelemetry/sdk-metrics";
import { NodeTracerProvider } from "@opentelemetry/sdk-trace-node";
import { BatchSpanProcessor } from "@opentelemetry/sdk-trace-base";
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from "@opentelemetry/semantic-conventions";
import type { LogLevel } from "@tribunal/config";

type Meter = ReturnType<typeof metrics.getMeter>;

export interface EngineTelemetry {
  nodeDurationMs: ReturnType<Meter["createHistogram"]>;
  nodeFailuresTotal: ReturnType<Meter["createCounter"]>;
  stageRunsTotal: ReturnType<Meter["createCounter"]>;
  generatorAttemptsTotal: ReturnType<Meter["createCounter"]>;
  degradedOpinionsTotal: ReturnType<Meter["createCounter"]>;
}

let tracerProvider: NodeTracerProvider | undefined;
let meterProvider: MeterProvider | undefined;

export async function initOpenTelemetry(serviceName: string, serviceVersion = "0.1.0"): Promise<void> {
  if (tracerProvider || meterProvider) {
    return;
  }

  const endpoint = process.env.OTEL_EXPORTER_OTLP_ENDPOINT ?? "http://127.0.0.1:4318";
  const resource = new Resource({
    [ATTR_SERVICE_NAME]: serviceName,
    [ATTR_SERVICE_VERSION]: serviceVersion,
  });

  const traceExporter = new OTLPTraceExporter({ url: `${endpoint}/v1/traces` });
  tracerProvider = new NodeTracerProvider({ resource });
  tracerProvider.addSpanProcessor(new BatchSpanProcessor(traceExporter));
  tracerProvider.register();

  const metricExporter = new OTLPMetricExporter({ url: `${endpoint}/v1/metrics` });
  const metricReader = new PeriodicExportingMetricReader({
    exporter: metricExporter,
    exportIntervalMillis: 1_000,
  });
  meterProvider = new MeterProvider({ resource, readers: [metricReader] });
  metrics.setGlobalMeterProvider(meterProvider);
}

export async function shutdownOpenTelemetry(): Promise<void> {
  await Promise.all([tracerProvider?.shutdown(), meterProvider?.shutdown()]);
  tracerProvider = undefined;
  meterProvider = undefined;
}

export const engineTracer = trace.getTracer("tribunal.engine", "0.1.0");

const engineMeter = metrics.getMeter("tribunal.engine", "0.1.0");
export const engineTelemetry: EngineTelemetry = {
  nodeDurationMs: engineMeter.createHistogram("audit_node_duration_ms", {
    description: "Node duration in milliseconds",
  }),
  nodeFailuresTotal: engineMeter.createCounter("audit_node_failures_total", {
    description: "Nodes whose failure was converted into an error delta",
  }),
  stageRunsTotal: engineMeter.createCounter("audit_stage_runs_total", {
    description: "Total fan-out stages dispatched",
  }),
  generatorAttemptsTotal: engineMeter.createCounter("audit_generator_attempts_total", {
    description: "Generator calls made by the structured extraction adapter",
  }),
  degradedOpinionsTotal: engineMeter.createCounter("audit_degraded_opinions_total", {
    description: "Opinions replaced by a placeholder after the attempt budget ran out",
  }),
};

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };
let minimumLevel: LogLevel = "info";

/** Set the lowest level `emitStructuredLog` writes. */
export function setLogLevel(level: LogLevel): void {
  minimumLevel = level;
}

export function emitStructuredLog(
  service: string,
  level: LogLevel,
  message: string,
  extra: Record<string, unknown> = {},
): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minimumLevel]) {
    return;
  }
  const activeSpan = trace.getSpan(context.active());
  const spanContext = activeSpan?.spanContext();
  const entry = {
    timestamp: new Date().toISOString(),
    service_name: service,
    level,
    message,
    traceId: spanContext?.traceId,
    spanId: spanContext?.spanId,
    ...extra,
  };

  process.stdout.write(`${JSON.stringify(entry)}\n`);
}

export function markSpanOk(): void {
  const span = trace.getSpan(context.active());
  span?.setStatus({ code: SpanStatusCode.OK });
}

export function markSpanError(err: unknown): void {
  const span = trace.getSpan(context.active());
  if (!span) {
    return;
  }
  span.recordException(err instanceof Error ? err : new Error(String(err)));
  span.setStatus({
    code: SpanStatusCode.ERROR,
    message: err instanceof Error ? err.message : String(err),
  });
}
