import {
  trace,
  context,
  SpanKind,
  SpanStatusCode,
  Span,
  TraceFlags,
  metrics,
  ValueType,
  DiagConsoleLogger,
  DiagLogLevel,
  diag,
  ROOT_CONTEXT,
  createTraceState,
  Attributes,
} from '@opentelemetry/api';
import { randomUUID } from 'crypto';
import dotenv from 'dotenv';

dotenv.config();

export { SpanKind };

function resolveDiagLevel(value: string | undefined): DiagLogLevel {
  switch ((value || 'INFO').toUpperCase()) {
    case 'NONE': return DiagLogLevel.NONE;
    case 'ERROR': return DiagLogLevel.ERROR;
    case 'WARN': return DiagLogLevel.WARN;
    case 'DEBUG': return DiagLogLevel.DEBUG;
    case 'VERBOSE': return DiagLogLevel.VERBOSE;
    case 'ALL': return DiagLogLevel.ALL;
    default: return DiagLogLevel.INFO;
  }
}

diag.setLogger(new DiagConsoleLogger(), resolveDiagLevel(process.env.OTEL_LOG_LEVEL));

const serviceName = process.env.SERVICE_NAME || 'server-datasources-client';

const tracer = trace.getTracer(serviceName);
const meter = metrics.getMeter(serviceName);

const requestCounter = meter.createCounter('datasources_client.requests.total', {
  description: 'Total number of endpoint operations',
  valueType: ValueType.INT,
});

const errorCounter = meter.createCounter('datasources_client.requests.errors', {
  description: 'Total number of failed endpoint operations',
  valueType: ValueType.INT,
});

const successCounter = meter.createCounter('datasources_client.requests.success', {
  description: 'Total number of successful endpoint operations',
  valueType: ValueType.INT,
});

const latencyHistogram = meter.createHistogram('datasources_client.requests.duration', {
  description: 'Endpoint operation duration in milliseconds',
  unit: 'ms',
  valueType: ValueType.DOUBLE,
});

// Root context with a valid trace id, used when nothing else is active
let rootContext = ROOT_CONTEXT;

function initializeRootContext(): { traceId: string; spanId: string } {
  // 32 hex chars = 16 bytes
  const traceId = randomUUID().replace(/-/g, '');
  const spanId = traceId.substring(0, 16);

  rootContext = trace.setSpanContext(ROOT_CONTEXT, {
    traceId,
    spanId,
    traceFlags: TraceFlags.SAMPLED,
    isRemote: false,
    traceState: createTraceState('')
  });

  return { traceId, spanId };
}

initializeRootContext();

export interface SpanOptions {
  kind?: SpanKind;
  attributes?: Attributes;
}

function activeContext() {
  return trace.getSpan(context.active()) ? context.active() : rootContext;
}

/**
 * Starts a new span as a child of the active span, or of the root context
 */
function createSpan(name: string, options?: SpanOptions): Span {
  return tracer.startSpan(
    name,
    {
      kind: options?.kind ?? SpanKind.INTERNAL,
      attributes: options?.attributes
    },
    activeContext()
  );
}

/**
 * Runs `fn` inside a span, recording status, exceptions and the
 * request/success/error counters and latency histogram
 */
export async function withSpan<T>(
  name: string,
  fn: (span: Span) => Promise<T> | T,
  options?: SpanOptions
): Promise<T> {
  const span = createSpan(name, options);
  const startTime = Date.now();
  const metricAttributes: Attributes = { operation: name, ...options?.attributes };

  try {
    requestCounter.add(1, metricAttributes);

    const result = await context.with(trace.setSpan(activeContext(), span), () => fn(span));

    span.setStatus({ code: SpanStatusCode.OK });
    successCounter.add(1, metricAttributes);

    return result;
  } catch (error) {
    span.setStatus({
      code: SpanStatusCode.ERROR,
      message: error instanceof Error ? error.message : String(error)
    });
    span.recordException(error instanceof Error ? error : new Error(String(error)));

    errorCounter.add(1, {
      ...metricAttributes,
      error: error instanceof Error ? error.name : 'unknown'
    });

    throw error;
  } finally {
    latencyHistogram.record(Date.now() - startTime, metricAttributes);
    span.end();
  }
}

/**
 * Returns the ids of the active span, falling back to the root context
 */
export function getCurrentTraceContext(): {
  traceId: string;
  spanId: string;
  traceFlags: number;
} {
  const currentSpan = trace.getSpan(context.active());
  if (currentSpan) {
    const spanContext = currentSpan.spanContext();
    return {
      traceId: spanContext.traceId,
      spanId: spanContext.spanId,
      traceFlags: spanContext.traceFlags
    };
  }

  const rootSpanContext = trace.getSpanContext(rootContext);
  if (!rootSpanContext) {
    const { traceId, spanId } = initializeRootContext();
    return { traceId, spanId, traceFlags: TraceFlags.SAMPLED };
  }

  return {
    traceId: rootSpanContext.traceId,
    spanId: rootSpanContext.spanId,
    traceFlags: rootSpanContext.traceFlags
  };
}
