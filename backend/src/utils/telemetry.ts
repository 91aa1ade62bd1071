import { metrics, SpanStatusCode, trace } from '@opentelemetry/api';
import type { Attributes, Counter, Meter, Tracer } from '@opentelemetry/api';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-proto';
import { Resource } from '@opentelemetry/resources';
import { ConsoleSpanExporter, SimpleSpanProcessor } from '@opentelemetry/sdk-trace-base';
import type { SpanProcessor } from '@opentelemetry/sdk-trace-base';
import { NodeTracerProvider } from '@opentelemetry/sdk-trace-node';
import { SemanticResourceAttributes } from '@opentelemetry/semantic-conventions';
import type { AppConfig } from '../config/app.js';
import { errorMessage } from './errors.js';
import { createComponentLogger } from './logger.js';

const INSTRUMENTATION_NAME = 'logscope';

const log = createComponentLogger('telemetry');

export interface TelemetryOptions {
  serviceName: string;
  environment: string;
  /** OTLP/HTTP traces endpoint. */
  otlpEndpoint?: string;
  consoleSpans: boolean;
}

export function telemetryOptionsFromConfig(appConfig: AppConfig): TelemetryOptions {
  return {
    serviceName: appConfig.OTEL_SERVICE_NAME,
    environment: appConfig.NODE_ENV,
    otlpEndpoint: appConfig.OTEL_EXPORTER_OTLP_ENDPOINT,
    consoleSpans: appConfig.ENABLE_CONSOLE_TRACING
  };
}

let provider: NodeTracerProvider | undefined;

/**
 * Registers the global tracer provider. Runs once per process; until it
 * does, spans go to the no-op tracer of @opentelemetry/api.
 */
export function initTelemetry(options: TelemetryOptions): void {
  if (provider) {
    return;
  }

  const processors: SpanProcessor[] = [];
  if (options.otlpEndpoint) {
    processors.push(new SimpleSpanProcessor(new OTLPTraceExporter({ url: options.otlpEndpoint })));
  }
  if (options.consoleSpans) {
    processors.push(new SimpleSpanProcessor(new ConsoleSpanExporter()));
  }

  const created = new NodeTracerProvider({
    resource: new Resource({
      [SemanticResourceAttributes.SERVICE_NAME]: options.serviceName,
      [SemanticResourceAttributes.DEPLOYMENT_ENVIRONMENT]: options.environment
    })
  });
  processors.forEach((processor) => created.addSpanProcessor(processor));
  created.register();
  provider = created;

  log.info(
    { serviceName: options.serviceName, otlp: Boolean(options.otlpEndpoint), console: options.consoleSpans },
    'tracing initialised'
  );
}

export async function shutdownTelemetry(): Promise<void> {
  const current = provider;
  provider = undefined;
  await current?.shutdown();
}

export function getTracer(): Tracer {
  return trace.getTracer(INSTRUMENTATION_NAME);
}

/** Runs `fn` inside an active span named `name`; a rejection marks the span as failed. */
export function traced<T>(name: string, fn: () => Promise<T>, attributes?: Attributes): Promise<T> {
  return getTracer().startActiveSpan(name, { attributes }, async (span) => {
    try {
      return await fn();
    } catch (error) {
      span.recordException(error instanceof Error ? error : new Error(errorMessage(error)));
      span.setStatus({ code: SpanStatusCode.ERROR, message: errorMessage(error) });
      throw error;
    } finally {
      span.end();
    }
  });
}

export type RetryReason = 'empty_result' | 'intent_without_action' | 'premature_giving_up';

/** Counters the orchestrator reports while running turns. */
export interface TurnMetrics {
  retryAttempt(reason: RetryReason): void;
  intentDetected(kind: string, confidence: number): void;
  historyPruned(messages: number): void;
  resultArchived(tool: string): void;
}

export function confidenceBucket(confidence: number): 'high' | 'medium' | 'low' {
  if (confidence >= 0.9) return 'high';
  if (confidence >= 0.7) return 'medium';
  return 'low';
}

/**
 * TurnMetrics over OpenTelemetry counters. Values reach an exporter only
 * when the host process registers a global MeterProvider.
 */
export class OtelTurnMetrics implements TurnMetrics {
  private readonly retries: Counter;
  private readonly intents: Counter;
  private readonly pruned: Counter;
  private readonly archived: Counter;

  constructor(meter: Pick<Meter, 'createCounter'> = metrics.getMeter(INSTRUMENTATION_NAME)) {
    this.retries = meter.createCounter('retry_attempts', {
      description: 'Automatic retries and nudges issued during turns'
    });
    this.intents = meter.createCounter('intent_detection_hits', {
      description: 'Model replies that stated an action without calling a tool'
    });
    this.pruned = meter.createCounter('history_pruned', {
      description: 'Messages dropped from conversation history to stay within the token budget',
      unit: '{message}'
    });
    this.archived = meter.createCounter('results_archived', {
      description: 'Tool results too large for the model context that were archived for paging'
    });
  }

  retryAttempt(reason: RetryReason): void {
    this.retries.add(1, { reason });
  }

  intentDetected(kind: string, confidence: number): void {
    this.intents.add(1, { intent_type: kind, confidence_bucket: confidenceBucket(confidence) });
  }

  historyPruned(messages: number): void {
    this.pruned.add(messages);
  }

  resultArchived(tool: string): void {
    this.archived.add(1, { tool });
  }
}
